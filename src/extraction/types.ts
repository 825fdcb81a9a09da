/**
 * Extraction collaborator interfaces
 *
 * @module extraction/types
 */

import type { DecodedMetadata, SourceRecord } from "../documents/types.js";
import type { Entity } from "../graph/types.js";
import type { TextChunk } from "../ingestion/types.js";

/**
 * What an extraction agent reads: text chunks when the pipeline chunked the
 * document, otherwise the decoded records themselves
 */
export type ExtractionUnit = TextChunk | SourceRecord;

/**
 * Options passed to every collaborator call made during a run
 */
export interface ExtractionCallOptions {
  /** Aborted when the pipeline deadline expires */
  signal?: AbortSignal;
}

/**
 * Turns units into entity and relation candidates
 *
 * Candidates are loosely shaped (see `graph/normalize`); the Extraction
 * stage normalizes and deduplicates them. Relations naming an entity that is
 * not in the entity set are dropped later with a warning, not raised here.
 */
export interface ExtractionAgent {
  /**
   * @param units - Units to read, in document order
   * @param metadata - Decoded document metadata
   * @param batchSize - Units per request to the underlying model
   * @returns Raw entity candidates
   */
  extractEntities(
    units: readonly ExtractionUnit[],
    metadata: DecodedMetadata,
    batchSize: number,
    options?: ExtractionCallOptions
  ): Promise<unknown[]>;

  /**
   * @param entities - Merged entities the relations should connect
   * @returns Raw relation candidates
   */
  extractRelations(
    units: readonly ExtractionUnit[],
    entities: readonly Entity[],
    metadata: DecodedMetadata,
    batchSize: number,
    options?: ExtractionCallOptions
  ): Promise<unknown[]>;
}

/**
 * A typed span found by named-entity recognition. Mentions are kept apart
 * from extracted entities.
 */
export interface NerMention {
  text: string;
  label: string;
  /** Character offset of the span in the analysed text */
  start: number;
  /** Exclusive end offset */
  end: number;
  confidence: number;
}

/**
 * Named-entity recognizer used by the NER stage
 */
export interface NerService {
  extractEntities(text: string, options?: ExtractionCallOptions): Promise<NerMention[]>;
}

/**
 * Single-turn text completion
 */
export interface ChatClient {
  readonly model: string;
  complete(prompt: string, options?: ExtractionCallOptions): Promise<string>;
}
