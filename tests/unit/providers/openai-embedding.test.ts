/**
 * Unit tests for OpenAIEmbeddingProvider
 *
 * The SDK is replaced by MockOpenAIEmbeddings through the constructor's
 * client parameter.
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import {
  OpenAIEmbeddingProvider,
  type OpenAIProviderConfig,
} from "../../../src/providers/openai-embedding.js";
import {
  EmbeddingAuthenticationError,
  EmbeddingError,
  EmbeddingNetworkError,
  EmbeddingRateLimitError,
  EmbeddingValidationError,
} from "../../../src/providers/errors.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { MockApiError, MockOpenAIEmbeddings } from "../../helpers/openai-mock.js";

const baseConfig: OpenAIProviderConfig = {
  provider: "openai",
  model: "text-embedding-3-small",
  dimensions: 3,
  batchSize: 2,
  maxRetries: 0,
  timeoutMs: 1000,
  apiKey: "sk-test-secret-placeholder",
};

function createProvider(
  overrides: Partial<OpenAIProviderConfig> = {},
  client: MockOpenAIEmbeddings = new MockOpenAIEmbeddings(3)
): { provider: OpenAIEmbeddingProvider; client: MockOpenAIEmbeddings } {
  return { provider: new OpenAIEmbeddingProvider({ ...baseConfig, ...overrides }, client), client };
}

beforeEach(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterEach(() => {
  resetLogger();
});

describe("OpenAIEmbeddingProvider - configuration", () => {
  test("exposes model and dimensions", () => {
    const { provider } = createProvider();

    expect(provider.providerId).toBe("openai");
    expect(provider.modelId).toBe("text-embedding-3-small");
    expect(provider.dimensions).toBe(3);
  });

  test.each([
    [{ apiKey: "" }, "API key is required"],
    [{ apiKey: "test-secret" }, "Invalid OpenAI API key format (must start with 'sk-')"],
    [{ dimensions: 0 }, "Dimensions must be positive"],
    [{ batchSize: 101 }, "Batch size must be between 1 and 100"],
    [{ maxRetries: -1 }, "Max retries must be non-negative"],
    [{ timeoutMs: 0 }, "Timeout must be positive"],
  ])("rejects %o", (overrides, message) => {
    expect(() => createProvider(overrides)).toThrow(new EmbeddingValidationError(message));
  });
});

describe("OpenAIEmbeddingProvider.generateEmbeddings", () => {
  test("batches requests and returns vectors in input order", async () => {
    const { provider, client } = createProvider();

    const vectors = await provider.generateEmbeddings(["Tom Hanks", "Big", "Splash"]);

    expect(client.requests.map((request) => request.input)).toEqual([["Tom Hanks", "Big"], ["Splash"]]);
    expect(client.requests[0]).toMatchObject({ model: "text-embedding-3-small", dimensions: 3 });
    expect(vectors).toEqual([
      [9, 0, 0],
      [3, 1, 0],
      [6, 0, 0],
    ]);
  });

  test("generateEmbedding returns the single vector", async () => {
    const { provider } = createProvider();

    expect(await provider.generateEmbedding("Meg Ryan")).toEqual([8, 0, 0]);
  });

  test("rejects empty input without calling the API", async () => {
    const { provider, client } = createProvider();

    await expect(provider.generateEmbeddings([])).rejects.toThrow("Input array cannot be empty");
    await expect(provider.generateEmbeddings(["ok", "  "])).rejects.toThrow(
      "Input at index 1 cannot be empty or whitespace only"
    );
    expect(client.requests).toEqual([]);
  });

  test("fails when the response is short", async () => {
    const client = new MockOpenAIEmbeddings(3);
    client.dropItems = 1;
    const { provider } = createProvider({}, client);

    await expect(provider.generateEmbeddings(["a", "b"])).rejects.toThrow("Expected 2 embeddings, got 1");
  });
});

describe("OpenAIEmbeddingProvider - error mapping", () => {
  test.each([
    [401, EmbeddingAuthenticationError, "Invalid API key or insufficient permissions"],
    [429, EmbeddingRateLimitError, "Rate limit exceeded"],
    [503, EmbeddingNetworkError, "Server error: upstream unavailable"],
    [400, EmbeddingValidationError, "Client error: upstream unavailable"],
  ])("status %d", async (status, type, message) => {
    const client = new MockOpenAIEmbeddings(3);
    client.failures = [new MockApiError(status, "upstream unavailable")];
    const { provider } = createProvider({}, client);

    const error = await provider.generateEmbeddings(["Tom Hanks"]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(type);
    expect(error).toHaveProperty("message", message);
  });

  test("reads retry-after on rate limits", async () => {
    const client = new MockOpenAIEmbeddings(3);
    client.failures = [new MockApiError(429, "slow down", { "retry-after": "7" })];
    const { provider } = createProvider({}, client);

    const error = await provider.generateEmbeddings(["Tom Hanks"]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EmbeddingRateLimitError);
    expect(error).toHaveProperty("retryAfterMs", 7000);
  });

  test("maps connection failures to network errors", async () => {
    const client = new MockOpenAIEmbeddings(3);
    client.failures = [new Error("connect ECONNREFUSED 127.0.0.1:443")];
    const { provider } = createProvider({}, client);

    await expect(provider.generateEmbeddings(["x"])).rejects.toThrow(new EmbeddingNetworkError("Connection failed"));
  });

  test("wraps anything else as a non-retryable EmbeddingError", async () => {
    const client = new MockOpenAIEmbeddings(3);
    client.failures = ["boom"];
    const { provider } = createProvider({}, client);

    const error = await provider.generateEmbeddings(["x"]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toHaveProperty("code", "UNKNOWN_ERROR");
    expect(error).toHaveProperty("retryable", false);
  });
});

describe("OpenAIEmbeddingProvider - retries", () => {
  test("retries a retryable failure once and succeeds", async () => {
    const client = new MockOpenAIEmbeddings(3);
    client.failures = [new MockApiError(500, "flaky")];
    const { provider } = createProvider({ maxRetries: 1 }, client);

    const vectors = await provider.generateEmbeddings(["Big"]);

    expect(vectors).toEqual([[3, 0, 0]]);
    expect(client.requests).toHaveLength(2);
  });

  test("does not retry authentication failures", async () => {
    const client = new MockOpenAIEmbeddings(3);
    client.failures = [new MockApiError(401, "bad key")];
    const { provider } = createProvider({ maxRetries: 3 }, client);

    await expect(provider.generateEmbeddings(["Big"])).rejects.toBeInstanceOf(EmbeddingAuthenticationError);
    expect(client.requests).toHaveLength(1);
  });
});

describe("OpenAIEmbeddingProvider.healthCheck", () => {
  test("true when an embedding comes back", async () => {
    const { provider, client } = createProvider();

    expect(await provider.healthCheck()).toBe(true);
    expect(client.requests[0]?.input).toEqual(["health check"]);
  });

  test("false instead of throwing", async () => {
    const client = new MockOpenAIEmbeddings(3);
    client.failures = [new MockApiError(401, "bad key")];
    const { provider } = createProvider({}, client);

    expect(await provider.healthCheck()).toBe(false);
  });
});
