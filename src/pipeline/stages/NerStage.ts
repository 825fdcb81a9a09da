/**
 * @module pipeline/stages/NerStage
 */

import type { NerService } from "../../extraction/types.js";
import type { ChunkMention, PipelineContext } from "../PipelineContext.js";
import { Stage } from "../Stage.js";
import { STAGE_NAMES, type StageResult } from "../types.js";

/**
 * Collect typed mentions from every chunk. Mentions stay separate from the
 * extracted entities.
 */
export class NerStage extends Stage {
  /** @param service - Recognizer; the stage skips when omitted */
  constructor(private readonly service?: NerService) {
    super(STAGE_NAMES.ner);
  }

  /**
   * Chunks are analysed one at a time, in order
   *
   * @throws {NerError} when the recognizer fails for any chunk
   */
  async execute(context: PipelineContext): Promise<StageResult> {
    if (context.chunks.length === 0) {
      return this.skipped("no_chunks");
    }
    if (!this.service) {
      return this.skipped("no_service");
    }

    const mentions: ChunkMention[] = [];
    for (const chunk of context.chunks) {
      const found = await this.service.extractEntities(chunk.content, { signal: context.signal });
      mentions.push(...found.map((mention) => ({ ...mention, chunkIndex: chunk.index })));
    }

    context.assertActive(this.name);
    context.mentions = mentions;

    const byLabel: Record<string, number> = {};
    for (const mention of mentions) {
      byLabel[mention.label] = (byLabel[mention.label] ?? 0) + 1;
    }
    return this.completed({ mentionCount: mentions.length, byLabel });
  }
}
