/**
 * OpenAI embedding provider
 *
 * Batches texts, retries transient failures with backoff, and maps SDK
 * errors onto the {@link EmbeddingError} hierarchy with sanitized messages.
 *
 * @module providers/openai-embedding
 */

import OpenAI from "openai";
import type pino from "pino";
import type { EmbeddingProvider, EmbeddingProviderConfig, EmbeddingRequestOptions } from "./types.js";
import {
  EmbeddingError,
  EmbeddingAuthenticationError,
  EmbeddingRateLimitError,
  EmbeddingNetworkError,
  EmbeddingTimeoutError,
  EmbeddingValidationError,
} from "./errors.js";
import { withRetry, createRetryLogger } from "../utils/retry.js";
import { getComponentLogger } from "../logging/index.js";

/**
 * OpenAI-specific provider configuration
 */
export interface OpenAIProviderConfig extends EmbeddingProviderConfig {
  /** OpenAI API key (OPENAI_API_KEY) */
  apiKey: string;

  /** OpenAI organization id, when the key belongs to several */
  organization?: string;

  /** Alternate endpoint for proxies or compatible servers */
  baseURL?: string;
}

/**
 * The slice of the OpenAI SDK this provider calls
 */
export interface OpenAIEmbeddingsApi {
  embeddings: {
    create(
      body: { model: string; input: string[]; dimensions?: number },
      options?: { signal?: AbortSignal }
    ): Promise<{ data: Array<{ index: number; embedding: number[] }> }>;
  };
}

interface StatusError {
  status: number;
  message?: string;
  headers?: unknown;
}

/** SDK errors carry the HTTP status; transport errors do not */
function isStatusError(error: unknown): error is StatusError {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  );
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Embedding provider backed by the OpenAI embeddings API
 *
 * @example
 * ```typescript
 * const provider = new OpenAIEmbeddingProvider({
 *   provider: "openai",
 *   model: "text-embedding-3-small",
 *   dimensions: 1536,
 *   batchSize: 100,
 *   maxRetries: 3,
 *   timeoutMs: 30000,
 *   apiKey: config.openai.apiKey,
 * });
 *
 * const [vector] = await provider.generateEmbeddings(["Tom Hanks"]);
 * ```
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly providerId = "openai";
  readonly modelId: string;
  readonly dimensions: number;

  private readonly client: OpenAIEmbeddingsApi;
  private readonly config: OpenAIProviderConfig;
  private _logger: pino.Logger | null = null;

  /**
   * @param config - Model, dimensions, batching, retry and API key settings
   * @param client - SDK override; defaults to a new `OpenAI` client with SDK retries disabled
   * @throws {EmbeddingValidationError} If configuration is invalid
   */
  constructor(config: OpenAIProviderConfig, client?: OpenAIEmbeddingsApi) {
    this.validateConfig(config);
    this.config = config;
    this.modelId = config.model;
    this.dimensions = config.dimensions;

    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        organization: config.organization,
        baseURL: config.baseURL,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("providers:openai");
    }
    return this._logger;
  }

  /**
   * Embed a single text
   *
   * @param text - Non-blank text
   * @param options - Abort signal
   * @returns Vector of {@link dimensions} numbers
   * @throws {EmbeddingValidationError} for blank text
   * @throws {EmbeddingError} when the API call fails after retries
   */
  async generateEmbedding(text: string, options?: EmbeddingRequestOptions): Promise<number[]> {
    const [embedding] = await this.generateEmbeddings([text], options);
    if (!embedding) {
      throw new EmbeddingError("Provider returned no embedding", "RESPONSE_MISMATCH");
    }
    return embedding;
  }

  /**
   * Embed many texts, `batchSize` per request
   *
   * Batches are sent sequentially so results stay in input order
   *
   * @param texts - Non-empty list of non-blank texts
   * @param options - Abort signal that stops retries and pending requests
   * @returns One vector per input text
   * @throws {EmbeddingValidationError} for an empty list or a blank text
   */
  async generateEmbeddings(
    texts: string[],
    options: EmbeddingRequestOptions = {}
  ): Promise<number[][]> {
    this.validateInputs(texts);

    const batches = this.createBatches(texts);
    const allEmbeddings: number[][] = [];
    const startTime = Date.now();

    for (const batch of batches) {
      const embeddings = await withRetry(() => this.processBatch(batch, options.signal), {
        maxRetries: this.config.maxRetries,
        shouldRetry: (error) => error instanceof EmbeddingError && error.retryable,
        calculateBackoff: (attempt, error) => this.calculateBackoff(attempt, error),
        onRetry: createRetryLogger(this.logger, "OpenAI embeddings", this.config.maxRetries),
        signal: options.signal,
      });
      allEmbeddings.push(...embeddings);
    }

    this.logger.debug(
      {
        texts: texts.length,
        batches: batches.length,
        durationMs: Date.now() - startTime,
      },
      "Embeddings generated"
    );

    return allEmbeddings;
  }

  /**
   * Embed a fixed string; false on any failure
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.generateEmbedding("health check");
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "Embedding provider health check failed");
      return false;
    }
  }

  /**
   * @throws {EmbeddingValidationError} naming the first invalid setting
   */
  private validateConfig(config: OpenAIProviderConfig): void {
    if (!config.apiKey || config.apiKey.trim().length === 0) {
      throw new EmbeddingValidationError("API key is required", "apiKey");
    }

    if (!config.apiKey.startsWith("sk-")) {
      throw new EmbeddingValidationError(
        "Invalid OpenAI API key format (must start with 'sk-')",
        "apiKey"
      );
    }

    if (config.dimensions <= 0) {
      throw new EmbeddingValidationError("Dimensions must be positive", "dimensions");
    }

    if (config.batchSize <= 0 || config.batchSize > 100) {
      throw new EmbeddingValidationError("Batch size must be between 1 and 100", "batchSize");
    }

    if (config.maxRetries < 0) {
      throw new EmbeddingValidationError("Max retries must be non-negative", "maxRetries");
    }

    if (config.timeoutMs <= 0) {
      throw new EmbeddingValidationError("Timeout must be positive", "timeoutMs");
    }
  }

  private validateInputs(texts: string[]): void {
    if (texts.length === 0) {
      throw new EmbeddingValidationError("Input array cannot be empty");
    }

    texts.forEach((text, i) => {
      if (text.trim().length === 0) {
        throw new EmbeddingValidationError(
          `Input at index ${i} cannot be empty or whitespace only`,
          `texts[${i}]`
        );
      }
    });
  }

  private createBatches(texts: string[]): string[][] {
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.config.batchSize) {
      batches.push(texts.slice(i, i + this.config.batchSize));
    }
    return batches;
  }

  private async processBatch(batch: string[], signal?: AbortSignal): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.modelId,
          input: batch,
          dimensions: this.dimensions,
        },
        signal ? { signal } : undefined
      );

      const embeddings = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);

      if (embeddings.length !== batch.length) {
        throw new EmbeddingError(
          `Expected ${batch.length} embeddings, got ${embeddings.length}`,
          "RESPONSE_MISMATCH"
        );
      }

      return embeddings;
    } catch (error) {
      throw this.handleOpenAIError(error);
    }
  }

  /**
   * Map SDK and transport errors onto the EmbeddingError hierarchy
   */
  private handleOpenAIError(error: unknown): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    if (isStatusError(error)) {
      const message = error.message || "Unknown error";
      const cause = toError(error);

      switch (error.status) {
        case 401:
        case 403:
          return new EmbeddingAuthenticationError(
            "Invalid API key or insufficient permissions",
            cause
          );

        case 429:
          return new EmbeddingRateLimitError(
            "Rate limit exceeded",
            this.extractRetryAfter(error.headers),
            cause
          );

        case 408:
        case 504:
          return new EmbeddingTimeoutError("Request timeout", cause);

        default:
          if (error.status >= 500) {
            return new EmbeddingNetworkError(`Server error: ${message}`, cause);
          }
          return new EmbeddingValidationError(`Client error: ${message}`, undefined, cause);
      }
    }

    if (error instanceof Error) {
      const errorMessage = error.message.toLowerCase();

      if (
        errorMessage.includes("econnrefused") ||
        errorMessage.includes("enotfound") ||
        errorMessage.includes("econnreset")
      ) {
        return new EmbeddingNetworkError("Connection failed", error);
      }

      if (errorMessage.includes("timeout") || errorMessage.includes("etimedout")) {
        return new EmbeddingTimeoutError("Request timeout", error);
      }
    }

    const fallbackError = toError(error);
    return new EmbeddingError(
      fallbackError.message || "Unknown error",
      "UNKNOWN_ERROR",
      false,
      fallbackError
    );
  }

  /**
   * Seconds from a `retry-after` header, as milliseconds
   */
  private extractRetryAfter(headers: unknown): number | undefined {
    if (typeof headers !== "object" || headers === null || !("retry-after" in headers)) {
      return undefined;
    }
    const value = headers["retry-after"];
    if (typeof value !== "string") {
      return undefined;
    }
    const seconds = parseInt(value, 10);
    return isNaN(seconds) ? undefined : seconds * 1000;
  }

  /**
   * retry-after wins over `2^attempt * 1000ms`
   */
  private calculateBackoff(attempt: number, error: Error): number {
    if (error instanceof EmbeddingRateLimitError && error.retryAfterMs) {
      return error.retryAfterMs;
    }
    return Math.pow(2, attempt) * 1000;
  }
}
