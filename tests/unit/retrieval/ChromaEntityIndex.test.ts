/**
 * Unit tests for ChromaEntityIndex
 *
 * The collection is resolved to an in-memory MockEntityCollection.
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import {
  ChromaEntityIndex,
  entityDocument,
  entityIndexId,
  entityMetadata,
} from "../../../src/retrieval/ChromaEntityIndex.js";
import { EntityIndexError } from "../../../src/retrieval/errors.js";
import { EmbeddingRateLimitError } from "../../../src/providers/errors.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { MockEntityCollection } from "../../helpers/chroma-mock.js";
import { FakeEmbeddingProvider, makeEntity } from "../../helpers/pipeline-fakes.js";

const tom = makeEntity("Person", "Tom Hanks", {
  properties: { born: 1956, aliases: ["Thomas Hanks"], note: "" },
  source: "people.json",
});

function createIndex(batchSize?: number): {
  index: ChromaEntityIndex;
  collection: MockEntityCollection;
  embeddings: FakeEmbeddingProvider;
  resolved: string[];
} {
  const collection = new MockEntityCollection();
  const embeddings = new FakeEmbeddingProvider(4);
  const resolved: string[] = [];
  const index = new ChromaEntityIndex(
    { url: "http://localhost:8000", collection: "kg_entities", batchSize },
    embeddings,
    async (name) => {
      resolved.push(name);
      return collection;
    }
  );
  return { index, collection, embeddings, resolved };
}

beforeEach(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterEach(() => {
  resetLogger();
});

describe("entity rendering", () => {
  test("id is type and lowercase name", () => {
    expect(entityIndexId(tom)).toBe("Person:tom hanks");
  });

  test("document lists non-empty properties", () => {
    expect(entityDocument(tom)).toBe("Person: Tom Hanks\nborn: 1956\naliases: Thomas Hanks");
  });

  test("metadata is flat with properties as JSON", () => {
    expect(entityMetadata(tom)).toEqual({
      type: "Person",
      name: "Tom Hanks",
      confidence: 0.9,
      source: "people.json",
      properties: '{"born":1956,"aliases":["Thomas Hanks"],"note":""}',
    });
  });
});

describe("ChromaEntityIndex.indexEntities", () => {
  test("embeds and upserts in batches", async () => {
    const { index, collection, embeddings, resolved } = createIndex(2);
    const entities = [tom, makeEntity("Movie", "Big"), makeEntity("Movie", "Splash")];

    const indexed = await index.indexEntities(entities);

    expect(indexed).toBe(3);
    expect(resolved).toEqual(["kg_entities"]);
    expect(embeddings.requests).toHaveLength(2);
    expect(collection.upserts.map((upsert) => upsert.ids)).toEqual([
      ["Person:tom hanks", "Movie:big"],
      ["Movie:splash"],
    ]);
    expect(collection.rows.get("Movie:big")?.document).toBe("Movie: Big");
  });

  test("opens the collection once", async () => {
    const { index, resolved } = createIndex();

    await index.indexEntities([tom]);
    await index.indexEntities([makeEntity("Movie", "Big")]);

    expect(resolved).toEqual(["kg_entities"]);
  });

  test("does nothing for an empty list", async () => {
    const { index, resolved } = createIndex();

    expect(await index.indexEntities([])).toBe(0);
    expect(resolved).toEqual([]);
  });

  test("wraps embedding failures", async () => {
    const { index, embeddings } = createIndex();
    embeddings.error = new EmbeddingRateLimitError("Rate limit exceeded");

    const error = await index.indexEntities([tom]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EntityIndexError);
    expect(error).toMatchObject({
      message: "Failed to embed entities for indexing: Rate limit exceeded",
      code: "EMBEDDING_FAILED",
      collaborator: "entity-index",
      retryable: true,
    });
  });

  test("wraps upsert failures", async () => {
    const { index, collection } = createIndex();
    collection.error = new Error("disk full");

    await expect(index.indexEntities([tom])).rejects.toThrow(
      "Failed to upsert 1 entities into 'kg_entities': disk full"
    );
  });

  test("wraps collection failures as retryable", async () => {
    const index = new ChromaEntityIndex(
      { url: "http://localhost:8000", collection: "kg_entities" },
      new FakeEmbeddingProvider(4),
      async () => {
        throw new Error("ECONNREFUSED");
      }
    );

    const error = await index.indexEntities([tom]).catch((caught: unknown) => caught);

    expect(error).toMatchObject({
      message: "Failed to open collection 'kg_entities' at http://localhost:8000: ECONNREFUSED",
      code: "COLLECTION_ERROR",
      retryable: true,
    });
  });
});
