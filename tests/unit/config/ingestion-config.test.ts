/**
 * Unit tests for environment configuration loading
 */

import { describe, test, expect } from "vitest";
import { loadIngestionConfig, ConfigurationError } from "../../../src/config/index.js";

describe("loadIngestionConfig", () => {
  test("applies defaults for an empty environment", () => {
    const config = loadIngestionConfig({});

    expect(config.logLevel).toBe("info");
    expect(config.logFormat).toBe("pretty");
    expect(config.neo4j).toEqual({ uri: "bolt://localhost:7687", username: "neo4j" });
    expect(config.openai).toBeUndefined();
    expect(config.entityIndex).toEqual({
      url: "http://localhost:8000",
      collection: "kg_entities",
      enabled: true,
    });
    expect(config.pipeline).toEqual({
      strictValidation: false,
      chunkSize: 1000,
      chunkOverlap: 200,
      extractionBatchSize: 50,
    });
    expect(config.retry.maxRetries).toBe(3);
  });

  test("reads every override", () => {
    const config = loadIngestionConfig({
      LOG_LEVEL: "DEBUG",
      LOG_FORMAT: "json",
      NEO4J_URI: "bolt://graph:7687",
      NEO4J_USER: "ingest",
      NEO4J_PASSWORD: "test-secret",
      NEO4J_DATABASE: "films",
      OPENAI_API_KEY: " sk-test-secret-placeholder ",
      OPENAI_EMBEDDING_DIMENSIONS: "256",
      OPENAI_CHAT_MODEL: "gpt-4o",
      CHROMADB_URL: "http://chroma:8000",
      ENTITY_COLLECTION: "films_entities",
      ENTITY_INDEXING_ENABLED: "no",
      PIPELINE_TIMEOUT_MS: "5000",
      PIPELINE_STRICT_VALIDATION: "true",
      CHUNK_SIZE: "500",
      CHUNK_OVERLAP: "50",
      EXTRACTION_BATCH_SIZE: "20",
      MAX_RETRIES: "1",
    });

    expect(config.logLevel).toBe("debug");
    expect(config.logFormat).toBe("json");
    expect(config.neo4j).toEqual({
      uri: "bolt://graph:7687",
      username: "ingest",
      password: "test-secret",
      database: "films",
    });
    expect(config.openai).toEqual({
      apiKey: "sk-test-secret-placeholder",
      embeddingModel: "text-embedding-3-small",
      embeddingDimensions: 256,
      chatModel: "gpt-4o",
    });
    expect(config.entityIndex).toEqual({
      url: "http://chroma:8000",
      collection: "films_entities",
      enabled: false,
    });
    expect(config.pipeline).toEqual({
      timeoutMs: 5000,
      strictValidation: true,
      chunkSize: 500,
      chunkOverlap: 50,
      extractionBatchSize: 20,
    });
    expect(config.retry.maxRetries).toBe(1);
  });

  test("rejects an unknown log level", () => {
    expect(() => loadIngestionConfig({ LOG_LEVEL: "verbose" })).toThrow(
      'Invalid LOG_LEVEL: "verbose". Must be one of: silent, fatal, error, warn, info, debug, trace'
    );
  });

  test("names the variable behind an invalid pipeline value", () => {
    try {
      loadIngestionConfig({ CHUNK_OVERLAP: "1000" });
      expect.unreachable("should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError && error.variable).toBe("CHUNK_OVERLAP");
      expect(error instanceof Error && error.message).toBe(
        "Invalid CHUNK_OVERLAP: CHUNK_OVERLAP must be smaller than CHUNK_SIZE"
      );
    }
  });

  test("rejects a non-numeric timeout", () => {
    expect(() => loadIngestionConfig({ PIPELINE_TIMEOUT_MS: "soon" })).toThrow(
      "Invalid PIPELINE_TIMEOUT_MS"
    );
  });

  test("rejects a batch size out of range", () => {
    expect(() => loadIngestionConfig({ EXTRACTION_BATCH_SIZE: "0" })).toThrow(
      "Invalid EXTRACTION_BATCH_SIZE"
    );
  });

  test("rejects non-positive embedding dimensions", () => {
    expect(() =>
      loadIngestionConfig({ OPENAI_API_KEY: "sk-test-secret-placeholder", OPENAI_EMBEDDING_DIMENSIONS: "-4" })
    ).toThrow("Invalid OPENAI_EMBEDDING_DIMENSIONS: must be a positive integer");
  });
});
