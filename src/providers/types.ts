/**
 * Embedding provider interfaces
 *
 * @module providers/types
 */

/**
 * Configuration shared by embedding provider implementations
 */
export interface EmbeddingProviderConfig {
  /** Provider identifier (e.g., "openai") */
  provider: string;

  /** Model identifier (e.g., "text-embedding-3-small") */
  model: string;

  /** Expected embedding vector dimensions */
  dimensions: number;

  /** Maximum number of texts per request */
  batchSize: number;

  /** Maximum retry attempts for retryable errors */
  maxRetries: number;

  /** Request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * Per-call options
 */
export interface EmbeddingRequestOptions {
  /** Aborts in-flight requests and pending retries */
  signal?: AbortSignal;
}

/**
 * Text → vector service with a fixed dimensionality per model
 *
 * Implementations handle authentication, batching and retries, and must not
 * leak credentials in error messages.
 *
 * @example
 * ```typescript
 * const vectors = await provider.generateEmbeddings(["Tom Hanks", "Big (1988)"]);
 * vectors[0]?.length === provider.dimensions; // true
 * ```
 */
export interface EmbeddingProvider {
  readonly providerId: string;
  readonly modelId: string;
  readonly dimensions: number;

  /**
   * @throws {EmbeddingValidationError} for empty input
   * @throws {EmbeddingError} for provider failures
   */
  generateEmbedding(text: string, options?: EmbeddingRequestOptions): Promise<number[]>;

  /**
   * Embed many texts; results are in input order
   */
  generateEmbeddings(texts: string[], options?: EmbeddingRequestOptions): Promise<number[][]>;

  /**
   * Never throws; false on any failure
   */
  healthCheck(): Promise<boolean>;
}
