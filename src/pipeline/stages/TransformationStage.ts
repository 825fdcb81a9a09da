/**
 * @module pipeline/stages/TransformationStage
 */

import { NoOpStage } from "../Stage.js";
import { STAGE_NAMES } from "../types.js";

/**
 * Reserved for entity normalization rules. No rule is defined, so the stage
 * leaves the extracted data as it is.
 */
export class TransformationStage extends NoOpStage {
  constructor() {
    super(STAGE_NAMES.transformation);
  }
}
