/**
 * @module pipeline/stages/ParsingStage
 */

import type { DecoderRegistry } from "../../documents/decoders/DecoderRegistry.js";
import type { PipelineContext } from "../PipelineContext.js";
import { Stage } from "../Stage.js";
import { STAGE_NAMES, type StageResult } from "../types.js";

/**
 * Decode the source file into records and metadata
 */
export class ParsingStage extends Stage {
  /**
   * @param decoders - Registry the decoder for the context's format is taken from
   */
  constructor(private readonly decoders: DecoderRegistry) {
    super(STAGE_NAMES.parsing);
  }

  /**
   * @throws {UnsupportedFormatError} when no decoder handles the format
   * @throws {DecodeError} when the file cannot be decoded
   */
  async execute(context: PipelineContext): Promise<StageResult> {
    const decoder = this.decoders.get(context.format);
    const { records, metadata } = await decoder.decode(context.filePath, context.format);

    context.assertActive(this.name);
    context.records = records;
    context.metadata = metadata;

    this.logger.info(
      { file: context.filename, format: context.format, records: records.length },
      "Document decoded"
    );
    return this.completed({ recordCount: records.length, format: context.format });
  }
}
