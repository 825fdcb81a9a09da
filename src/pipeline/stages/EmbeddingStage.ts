/**
 * @module pipeline/stages/EmbeddingStage
 */

import { EmbeddingError } from "../../providers/errors.js";
import type { EmbeddingProvider } from "../../providers/types.js";
import type { PipelineContext } from "../PipelineContext.js";
import { Stage } from "../Stage.js";
import { STAGE_NAMES, type StageResult } from "../types.js";

/**
 * Embed every chunk. Skipped when there is nothing to embed or no provider
 * is configured.
 */
export class EmbeddingStage extends Stage {
  /**
   * @param provider - Embedding provider; the stage skips when omitted
   */
  constructor(private readonly provider?: EmbeddingProvider) {
    super(STAGE_NAMES.embedding);
  }

  /**
   * @throws {EmbeddingError} when the provider returns the wrong number of
   *   vectors or a vector of the wrong size
   */
  async execute(context: PipelineContext): Promise<StageResult> {
    if (context.chunks.length === 0) {
      return this.skipped("no_chunks");
    }
    const provider = this.provider;
    if (!provider) {
      return this.skipped("no_provider");
    }

    const vectors = await provider.generateEmbeddings(
      context.chunks.map((chunk) => chunk.content),
      { signal: context.signal }
    );

    if (vectors.length !== context.chunks.length) {
      throw new EmbeddingError(
        `Expected ${context.chunks.length} embeddings, got ${vectors.length}`,
        "RESPONSE_MISMATCH"
      );
    }
    const wrongSize = vectors.findIndex((vector) => vector.length !== provider.dimensions);
    if (wrongSize >= 0) {
      throw new EmbeddingError(
        `Embedding ${wrongSize} has ${vectors[wrongSize]?.length ?? 0} dimensions, expected ${provider.dimensions}`,
        "DIMENSION_MISMATCH"
      );
    }

    context.assertActive(this.name);
    context.embeddings = vectors;

    return this.completed({
      embeddingCount: vectors.length,
      dimensions: provider.dimensions,
      model: provider.modelId,
    });
  }
}
