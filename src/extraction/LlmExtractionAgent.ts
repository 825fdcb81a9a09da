/**
 * Prompted JSON extraction of entities and relations
 *
 * @module extraction/LlmExtractionAgent
 */

import type pino from "pino";
import type { DecodedMetadata } from "../documents/types.js";
import type { Entity } from "../graph/types.js";
import { getComponentLogger } from "../logging/index.js";
import { buildEntityPrompt, buildRelationPrompt } from "./prompts.js";
import { parseJsonArray } from "./response-parser.js";
import { ChatClientError, ExtractionError } from "./errors.js";
import type { ChatClient, ExtractionAgent, ExtractionCallOptions, ExtractionUnit } from "./types.js";

type PromptBuilder = (units: readonly ExtractionUnit[]) => string;

/**
 * Extraction agent that asks a chat model for JSON arrays, one request per
 * batch of units
 *
 * Batches run sequentially. Any batch failure (request error or unparseable
 * answer) fails the whole call with an {@link ExtractionError} naming the
 * batch; candidates from earlier batches are discarded.
 *
 * @example
 * ```typescript
 * const agent = new LlmExtractionAgent(new OpenAIChatClient({ apiKey, model: "gpt-4o-mini" }));
 * const candidates = await agent.extractEntities(records, metadata, 50);
 * ```
 */
export class LlmExtractionAgent implements ExtractionAgent {
  private _logger: pino.Logger | null = null;

  /** @param chat - Chat model client the prompts are sent to */
  constructor(private readonly chat: ChatClient) {}

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("extraction:llm");
    }
    return this._logger;
  }

  /**
   * Ask for entity candidates, `batchSize` units per request
   *
   * @param units - Records or chunks to read
   * @param metadata - Decoded document metadata included in the prompt
   * @param batchSize - Units per request
   * @param options - Abort signal passed to every request
   * @returns Raw candidates from every batch; normalization happens in the caller
   * @throws {ExtractionError} for an invalid batch size or a failed batch
   */
  async extractEntities(
    units: readonly ExtractionUnit[],
    metadata: DecodedMetadata,
    batchSize: number,
    options: ExtractionCallOptions = {}
  ): Promise<unknown[]> {
    return this.runBatches(
      "entity",
      units,
      batchSize,
      (batch) => buildEntityPrompt(batch, metadata),
      options
    );
  }

  /**
   * Ask for relation candidates between the given entities
   *
   * Makes no request when fewer than two entities are known.
   *
   * @throws {ExtractionError} for an invalid batch size or a failed batch
   */
  async extractRelations(
    units: readonly ExtractionUnit[],
    entities: readonly Entity[],
    metadata: DecodedMetadata,
    batchSize: number,
    options: ExtractionCallOptions = {}
  ): Promise<unknown[]> {
    if (entities.length < 2) {
      return [];
    }
    return this.runBatches(
      "relation",
      units,
      batchSize,
      (batch) => buildRelationPrompt(batch, entities, metadata),
      options
    );
  }

  private async runBatches(
    what: "entity" | "relation",
    units: readonly ExtractionUnit[],
    batchSize: number,
    buildPrompt: PromptBuilder,
    options: ExtractionCallOptions
  ): Promise<unknown[]> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ExtractionError(`Batch size must be a positive integer, got ${batchSize}`, "INVALID_BATCH_SIZE");
    }

    const batches: ExtractionUnit[][] = [];
    for (let i = 0; i < units.length; i += batchSize) {
      batches.push(units.slice(i, i + batchSize));
    }

    const candidates: unknown[] = [];
    for (const [i, batch] of batches.entries()) {
      const number = i + 1;
      try {
        const answer = await this.chat.complete(buildPrompt(batch), options);
        const items = parseJsonArray(answer);
        candidates.push(...items);
        this.logger.debug(
          { what, batch: number, batches: batches.length, units: batch.length, candidates: items.length },
          "Extraction batch finished"
        );
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        throw new ExtractionError(
          `${what === "entity" ? "Entity" : "Relation"} extraction failed on batch ${number}/${batches.length}: ${cause.message}`,
          "BATCH_FAILED",
          {
            batch: number,
            retryable: error instanceof ChatClientError && error.retryable,
            cause,
          }
        );
      }
    }

    this.logger.info(
      { what, units: units.length, batches: batches.length, candidates: candidates.length },
      "Extraction finished"
    );
    return candidates;
  }
}
