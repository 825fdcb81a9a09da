/**
 * Embedding providers
 *
 * @module providers
 */

export type { EmbeddingProvider, EmbeddingProviderConfig, EmbeddingRequestOptions } from "./types.js";
export {
  EmbeddingError,
  EmbeddingAuthenticationError,
  EmbeddingRateLimitError,
  EmbeddingNetworkError,
  EmbeddingTimeoutError,
  EmbeddingValidationError,
  sanitizeMessage,
} from "./errors.js";
export {
  OpenAIEmbeddingProvider,
  type OpenAIProviderConfig,
  type OpenAIEmbeddingsApi,
} from "./openai-embedding.js";
