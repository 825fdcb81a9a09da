/**
 * Entity index interfaces
 *
 * @module retrieval/types
 */

import type { Entity } from "../graph/types.js";

/**
 * Semantic index over extracted entities, written after a successful run
 */
export interface EntityIndex {
  /**
   * Embed and store entities; returns how many were written
   *
   * @throws {EntityIndexError} when embedding or the index write fails
   */
  indexEntities(entities: readonly Entity[], options?: { signal?: AbortSignal }): Promise<number>;
}

export type EntityMetadataValue = string | number | boolean;

export interface EntityUpsert {
  ids: string[];
  embeddings: number[][];
  metadatas: Array<Record<string, EntityMetadataValue>>;
  documents: string[];
}

/**
 * The collection operation the index needs
 */
export interface EntityCollection {
  upsert(params: EntityUpsert): Promise<unknown>;
}
