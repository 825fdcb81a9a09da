/**
 * Formats Command - supported formats and the pipeline each one selects
 */

/* eslint-disable no-console */

import { createFormatsTable } from "../output/formatters.js";
import type { PipelineFactory } from "../../pipeline/PipelineFactory.js";

/** Print the formats table; needs no connection */
export function formatsCommand(factory: PipelineFactory): void {
  console.log(createFormatsTable((format) => factory.forFormat(format).getStageNames()));
}
