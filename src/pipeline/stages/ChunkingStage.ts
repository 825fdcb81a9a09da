/**
 * @module pipeline/stages/ChunkingStage
 */

import { RecordChunker } from "../../ingestion/record-chunker.js";
import type { ChunkerConfig } from "../../ingestion/types.js";
import type { PipelineContext } from "../PipelineContext.js";
import { Stage } from "../Stage.js";
import { STAGE_NAMES, type StageResult } from "../types.js";

/**
 * Cut records into text chunks for embedding, NER and extraction
 */
export class ChunkingStage extends Stage {
  private readonly chunker: RecordChunker;

  /**
   * @param config - Chunk size and overlap, in characters
   * @throws {ChunkerConfigError} for an invalid size/overlap pair
   */
  constructor(config: ChunkerConfig = {}) {
    super(STAGE_NAMES.chunking);
    this.chunker = new RecordChunker(config);
  }

  async execute(context: PipelineContext): Promise<StageResult> {
    if (context.records.length === 0) {
      return this.skipped("no_records");
    }

    const chunks = this.chunker.chunkRecords(context.records, context.filename);

    context.assertActive(this.name);
    context.chunks = chunks;

    const totalTokens = chunks.reduce((sum, chunk) => sum + chunk.tokenEstimate, 0);
    this.logger.debug({ file: context.filename, chunks: chunks.length, totalTokens }, "Chunked records");
    return this.completed({ chunkCount: chunks.length, totalTokens });
  }
}
