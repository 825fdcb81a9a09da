/**
 * @module pipeline/stages/EnrichmentStage
 */

import type { PipelineContext } from "../PipelineContext.js";
import { NoOpStage } from "../Stage.js";
import { STAGE_NAMES } from "../types.js";

/**
 * Reserved for entity enrichment. Copies entities and relations unchanged
 * into the enriched slots that later stages read.
 */
export class EnrichmentStage extends NoOpStage {
  constructor() {
    super(STAGE_NAMES.enrichment);
  }

  protected override apply(context: PipelineContext): void {
    context.enrichedEntities = [...context.entities];
    context.enrichedRelations = [...context.relations];
  }
}
