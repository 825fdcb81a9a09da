/**
 * ChromaDB-backed entity index
 *
 * @module retrieval/ChromaEntityIndex
 */

import { ChromaClient } from "chromadb";
import type pino from "pino";
import type { Entity } from "../graph/types.js";
import { getComponentLogger } from "../logging/index.js";
import type { EmbeddingProvider } from "../providers/types.js";
import { EmbeddingError } from "../providers/errors.js";
import { EntityIndexError } from "./errors.js";
import type {
  EntityCollection,
  EntityIndex,
  EntityMetadataValue,
  EntityUpsert,
} from "./types.js";

/**
 * Connection settings for {@link ChromaEntityIndex}
 */
export interface ChromaEntityIndexConfig {
  /** ChromaDB server URL, e.g. http://localhost:8000 */
  url: string;
  /** Collection name; created with cosine distance when missing */
  collection: string;
  /** @default 100 */
  batchSize?: number;
}

/** Opens a collection by name; tests pass an in-memory one */
export type CollectionResolver = (name: string) => Promise<EntityCollection>;

/**
 * Index id of an entity: `<type>:<lowercase name>`
 */
export function entityIndexId(entity: Pick<Entity, "type" | "name">): string {
  return `${entity.type}:${entity.name.toLowerCase()}`;
}

/**
 * Text that gets embedded for an entity
 *
 * The first line is `<type>: <name>`; each non-empty property follows as
 * `<key>: <value>`, with list values joined by commas.
 *
 * @param entity - Entity to describe
 * @returns Newline-separated description
 */
export function entityDocument(entity: Entity): string {
  const details = Object.entries(entity.properties)
    .filter(([, value]) => value !== null && value !== "")
    .map(([key, value]) => `${key}: ${Array.isArray(value) ? value.join(", ") : String(value)}`);
  return [`${entity.type}: ${entity.name}`, ...details].join("\n");
}

/**
 * Chroma metadata is flat scalars; properties travel as one JSON string
 */
export function entityMetadata(entity: Entity): Record<string, EntityMetadataValue> {
  return {
    type: entity.type,
    name: entity.name,
    confidence: entity.confidence,
    ...(entity.source !== undefined && { source: entity.source }),
    properties: JSON.stringify(entity.properties),
  };
}

function chromaCollectionResolver(url: string): CollectionResolver {
  const client = new ChromaClient({ path: url });
  return async (name) => {
    const collection = await client.getOrCreateCollection({
      name,
      metadata: { "hnsw:space": "cosine" },
    });
    return { upsert: (params: EntityUpsert) => collection.upsert(params) };
  };
}

/**
 * Entity index that embeds entity descriptions and upserts them into a
 * ChromaDB collection
 *
 * Ids are stable per `(type, name)`, so re-ingesting a file overwrites the
 * earlier vectors instead of adding new ones.
 *
 * @example
 * ```typescript
 * const index = new ChromaEntityIndex(
 *   { url: "http://localhost:8000", collection: "kg_entities" },
 *   embeddingProvider
 * );
 * await index.indexEntities(summaryEntities);
 * ```
 */
export class ChromaEntityIndex implements EntityIndex {
  private readonly resolveCollection: CollectionResolver;
  private collection: EntityCollection | null = null;
  private _logger: pino.Logger | null = null;

  /**
   * @param config - Server URL, collection name and batch size
   * @param embeddings - Provider used to embed entity descriptions
   * @param resolveCollection - Collection opener; a ChromaDB client by default
   */
  constructor(
    private readonly config: ChromaEntityIndexConfig,
    private readonly embeddings: EmbeddingProvider,
    resolveCollection?: CollectionResolver
  ) {
    this.resolveCollection = resolveCollection ?? chromaCollectionResolver(config.url);
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("retrieval:chroma");
    }
    return this._logger;
  }

  /**
   * Embed and upsert entities in batches
   *
   * @param entities - Final entities of an ingestion run
   * @param options - Abort signal passed to the embedding provider
   * @returns Number of entities written
   * @throws {EntityIndexError} when the collection cannot be opened, or
   *   embedding or upsert fails for a batch
   */
  async indexEntities(
    entities: readonly Entity[],
    options: { signal?: AbortSignal } = {}
  ): Promise<number> {
    if (entities.length === 0) {
      return 0;
    }
    const startTime = Date.now();
    const collection = await this.getCollection();
    const batchSize = this.config.batchSize ?? 100;
    let indexed = 0;

    for (let i = 0; i < entities.length; i += batchSize) {
      const batch = entities.slice(i, i + batchSize);
      const documents = batch.map(entityDocument);

      let vectors: number[][];
      try {
        vectors = await this.embeddings.generateEmbeddings(documents, options);
      } catch (error) {
        throw new EntityIndexError(
          `Failed to embed entities for indexing: ${error instanceof Error ? error.message : String(error)}`,
          "EMBEDDING_FAILED",
          error instanceof Error ? error : undefined,
          error instanceof EmbeddingError && error.retryable
        );
      }

      try {
        await collection.upsert({
          ids: batch.map(entityIndexId),
          embeddings: vectors,
          metadatas: batch.map(entityMetadata),
          documents,
        });
      } catch (error) {
        throw new EntityIndexError(
          `Failed to upsert ${batch.length} entities into '${this.config.collection}': ${error instanceof Error ? error.message : String(error)}`,
          "UPSERT_FAILED",
          error instanceof Error ? error : undefined
        );
      }
      indexed += batch.length;
    }

    this.logger.info(
      {
        metric: "chromadb.index_entities_ms",
        value: Date.now() - startTime,
        collection: this.config.collection,
        indexed,
      },
      "Entities indexed"
    );
    return indexed;
  }

  /** Opened once, then reused */
  private async getCollection(): Promise<EntityCollection> {
    if (this.collection) {
      return this.collection;
    }
    try {
      this.collection = await this.resolveCollection(this.config.collection);
      return this.collection;
    } catch (error) {
      throw new EntityIndexError(
        `Failed to open collection '${this.config.collection}' at ${this.config.url}: ${error instanceof Error ? error.message : String(error)}`,
        "COLLECTION_ERROR",
        error instanceof Error ? error : undefined,
        true
      );
    }
  }
}
