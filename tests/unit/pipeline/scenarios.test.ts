/**
 * End-to-end runs of the pre-configured pipelines over fixture files with
 * in-process collaborators
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { DecoderRegistry } from "../../../src/documents/decoders/DecoderRegistry.js";
import { IngestionDocument } from "../../../src/documents/IngestionDocument.js";
import { PipelineContext } from "../../../src/pipeline/PipelineContext.js";
import { PipelineFactory } from "../../../src/pipeline/PipelineFactory.js";
import type { ProgressEvent } from "../../../src/pipeline/types.js";
import { EmbeddingNetworkError } from "../../../src/providers/errors.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { fixturePath } from "../../helpers/fixtures.js";
import {
  FakeEmbeddingProvider,
  FakeExtractionAgent,
  FakeGraphGateway,
  FakeNerService,
} from "../../helpers/pipeline-fakes.js";

interface Harness {
  factory: PipelineFactory;
  graph: FakeGraphGateway;
  agent: FakeExtractionAgent;
  embeddings: FakeEmbeddingProvider;
  ner: FakeNerService;
}

function harness(agent: FakeExtractionAgent): Harness {
  const graph = new FakeGraphGateway();
  const embeddings = new FakeEmbeddingProvider(4);
  const ner = new FakeNerService({ "Tom Hanks": "PERSON", "Penny Marshall": "PERSON" });
  const factory = new PipelineFactory({
    decoders: DecoderRegistry.withDefaults(),
    graph,
    extractionAgent: agent,
    embeddingProvider: embeddings,
    nerService: ner,
  });
  return { factory, graph, agent, embeddings, ner };
}

function documentFor(filename: string, format: IngestionDocument["format"]): IngestionDocument {
  return new IngestionDocument({ id: "doc-1", filename, format, sizeBytes: 0 });
}

beforeEach(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterEach(() => {
  resetLogger();
});

describe("minimal pipeline over movies.csv", () => {
  const agent = (): FakeExtractionAgent =>
    new FakeExtractionAgent(
      [
        { type: "Person", name: "Tom Hanks", confidence: 0.9, properties: { born: 1956 } },
        { type: "Movie", name: "Big" },
        { type: "Movie", name: "Splash" },
        { type: "person", name: "tom hanks", confidence: 0.7, properties: { role: "actor" } },
        { type: "Person", name: "Penny Marshall" },
        { type: "Movie", name: "Apollo 13" },
      ],
      [
        { type: "ACTED_IN", fromEntity: "Tom Hanks", toEntity: "Big" },
        { type: "ACTED_IN", fromEntity: "Tom Hanks", toEntity: "Splash" },
        { type: "DIRECTED", fromEntity: "Penny Marshall", toEntity: "Big" },
        { type: "ACTED_IN", fromEntity: "Tom Hanks", toEntity: "Cast Away" },
      ]
    );

  test("merges duplicate people and stores the resolved graph", async () => {
    const { factory, graph, agent: fake } = harness(agent());
    const document = documentFor("movies.csv", "csv");
    const context = new PipelineContext({ filePath: fixturePath("movies.csv"), format: "csv", document });

    const summary = await factory.createMinimal().execute(context);

    expect(summary.success).toBe(true);
    expect(context.entities.map((entity) => entity.name)).toEqual([
      "Tom Hanks",
      "Big",
      "Splash",
      "Penny Marshall",
      "Apollo 13",
    ]);

    const tom = context.entities[0];
    expect(tom?.properties).toEqual({ born: 1956, role: "actor" });
    expect(tom?.confidence).toBeCloseTo(0.8);

    expect(context.relations.map((relation) => `${relation.fromEntity}-${relation.type}->${relation.toEntity}`)).toEqual([
      "Tom Hanks-ACTED_IN->Big",
      "Tom Hanks-ACTED_IN->Splash",
      "Penny Marshall-DIRECTED->Big",
    ]);
    expect(context.getStageResult("Extraction")?.outputData?.["droppedRelations"]).toBe(1);

    expect(fake.calls.map((call) => [call.batchSize, call.unitCount])).toEqual([
      [100, 10],
      [100, 10],
    ]);
    expect(graph.nodes.size).toBe(5);
    expect(graph.edges.size).toBe(3);
    expect(context.storage?.graphStats?.byType).toEqual({ ACTED_IN: 2, DIRECTED: 1 });

    expect(document.toJSON()).toMatchObject({
      status: "completed",
      progress: 100,
      entitiesExtracted: 5,
      relationsExtracted: 3,
    });
  });
});

describe("relations with mislabeled endpoint types", () => {
  test("keep their edge and take the resolved entities' types", async () => {
    const { factory, graph } = harness(
      new FakeExtractionAgent(
        [
          { type: "Person", name: "Tom Hanks" },
          { type: "Movie", name: "Big" },
        ],
        [
          { type: "ACTED_IN", fromEntity: "Tom Hanks", fromEntityType: "Actor", toEntity: "Big", toEntityType: "Film" },
          { type: "ACTED_IN", from_entity: "tom hanks", from_entity_type: "Movie", to_entity: "Big" },
        ]
      )
    );
    const context = new PipelineContext({ filePath: fixturePath("movies.csv"), format: "csv" });

    const summary = await factory.createMinimal().execute(context);

    expect(summary.success).toBe(true);
    expect(context.relations).toHaveLength(1);
    expect(context.relations[0]).toMatchObject({
      type: "ACTED_IN",
      fromEntity: "Tom Hanks",
      fromEntityType: "Person",
      toEntity: "Big",
      toEntityType: "Movie",
    });
    expect(context.getStageResult("Extraction")?.outputData?.["droppedRelations"]).toBe(0);
    expect(graph.edges.size).toBe(1);
  });
});

describe("free-text pipeline over notes.txt", () => {
  function freeTextAgent(): FakeExtractionAgent {
    return new FakeExtractionAgent(
      [
        { type: "Person", name: "Tom Hanks" },
        { type: "Movie", name: "Big" },
      ],
      [{ type: "ACTED_IN", from: "Tom Hanks", to: "Big" }]
    );
  }

  test("runs every stage and keeps NER mentions per chunk", async () => {
    const { factory, graph, embeddings } = harness(freeTextAgent());
    const document = documentFor("notes.txt", "txt");
    const context = new PipelineContext({ filePath: fixturePath("notes.txt"), format: "txt", document });
    const events: ProgressEvent[] = [];

    const summary = await factory.createFreeText().execute(context, { onProgress: (event) => events.push(event) });

    expect(summary.success).toBe(true);
    expect(context.chunks).toHaveLength(2);
    expect(embeddings.requests).toHaveLength(1);
    expect(context.embeddings).toHaveLength(2);

    const tomMentions = context.mentions.filter((mention) => mention.text === "Tom Hanks");
    expect(tomMentions.map((mention) => [mention.chunkIndex, mention.start])).toEqual([
      [0, 0],
      [1, 21],
    ]);
    expect(context.mentions).toHaveLength(3);
    expect(context.entities).toHaveLength(2);

    expect(events.map((event) => event.progress)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8].map((index) => (100 * index) / 9));
    expect(events[1]?.progress).toBeCloseTo(11.11, 2);
    expect(events.map((event) => event.status)).toEqual([
      "parsing",
      "parsing",
      "extracting_entities",
      "extracting_entities",
      "extracting_relations",
      "extracting_relations",
      "extracting_relations",
      "validating",
      "storing",
    ]);

    expect(context.getStageResult("Transformation")?.metadata).toEqual({ noop: true });
    expect(context.validationReport?.valid).toBe(true);
    expect(graph.edges.size).toBe(1);
    expect(document.status).toBe("completed");
    expect(document.progress).toBe(100);
  });

  test("an embedding failure stops the run before NER and extraction", async () => {
    const { factory, graph, embeddings, ner, agent } = harness(freeTextAgent());
    embeddings.error = new EmbeddingNetworkError("Embedding service unavailable (503)");
    const document = documentFor("notes.txt", "txt");
    const context = new PipelineContext({ filePath: fixturePath("notes.txt"), format: "txt", document });
    const events: ProgressEvent[] = [];

    const summary = await factory.createFreeText().execute(context, { onProgress: (event) => events.push(event) });

    expect(summary).toMatchObject({ pipeline: "free-text", success: false, timedOut: false, failedStage: "Embedding" });
    expect(context.errors).toEqual(["Embedding: Embedding service unavailable (503)"]);
    expect(context.stageResults.map((result) => [result.stageName, result.status])).toEqual([
      ["Parsing", "completed"],
      ["Chunking", "completed"],
      ["Embedding", "failed"],
    ]);
    expect(context.getStageResult("Embedding")?.metadata).toEqual({
      exceptionType: "EmbeddingNetworkError",
      errorCode: "NETWORK_ERROR",
      collaborator: "embedding",
      retryable: true,
    });

    expect(ner.texts).toEqual([]);
    expect(agent.calls).toEqual([]);
    expect(graph.entityBatches).toEqual([]);

    expect(events.at(-1)).toMatchObject({ stage: "Embedding", progress: 200 / 9, status: "extracting_entities" });
    expect(document.status).toBe("failed");
    expect(document.progress).toBe(200 / 9);
    expect(document.error).toBe("Embedding service unavailable (503)");
  });
});

describe("default pipeline over people.json", () => {
  test("a json file runs the default pipeline with one chunk per item", async () => {
    const { factory, agent } = harness(new FakeExtractionAgent([{ type: "Person", name: "Tom Hanks" }]));
    const pipeline = factory.forFormat("json");
    const context = new PipelineContext({ filePath: fixturePath("people.json"), format: "json" });

    const summary = await pipeline.execute(context);

    expect(pipeline.name).toBe("default");
    expect(summary.success).toBe(true);
    expect(context.chunks).toHaveLength(2);
    expect(agent.calls[0]?.unitCount).toBe(2);
  });
});
