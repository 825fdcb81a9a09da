/**
 * ChatClient over the OpenAI chat completions API
 *
 * @module extraction/OpenAIChatClient
 */

import OpenAI from "openai";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import { sanitizeMessage } from "../providers/errors.js";
import { withRetry, createRetryLogger, DEFAULT_RETRY_CONFIG, createExponentialBackoff, type RetryConfig } from "../utils/retry.js";
import { ChatClientError } from "./errors.js";
import type { ChatClient, ExtractionCallOptions } from "./types.js";

/**
 * Configuration for {@link OpenAIChatClient}
 */
export interface OpenAIChatClientConfig {
  /** OpenAI API key; never logged */
  apiKey: string;
  /** Chat model name, e.g. "gpt-4o-mini" */
  model: string;
  /** @default 0.1 */
  temperature?: number;
  /** @default 4000 */
  maxTokens?: number;
  /** @default 60000 */
  timeoutMs?: number;
  /** Alternative endpoint for OpenAI-compatible servers */
  baseURL?: string;
  /** Backoff applied by this client; the SDK's own retries are disabled */
  retry?: RetryConfig;
}

/**
 * The slice of the OpenAI SDK this client calls
 */
export interface OpenAIChatApi {
  chat: {
    completions: {
      create(
        body: {
          model: string;
          messages: Array<{ role: "user"; content: string }>;
          temperature?: number;
          max_tokens?: number;
        },
        options?: { signal?: AbortSignal }
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

/** HTTP status carried by an SDK error, if any */
function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}

/**
 * Classify an SDK failure
 *
 * 429, 408 and 5xx responses and connection-level failures are retryable;
 * authentication and other 4xx responses are not.
 *
 * @param error - Value thrown by the SDK
 * @returns ChatClientError with a sanitized message
 */
function toChatClientError(error: unknown): ChatClientError {
  if (error instanceof ChatClientError) {
    return error;
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  const message = sanitizeMessage(cause.message);
  const status = statusOf(error);

  if (status === 401 || status === 403) {
    return new ChatClientError(`Chat model authentication failed: ${message}`, "AUTHENTICATION_ERROR", { status, cause });
  }
  if (status === 429) {
    return new ChatClientError(`Chat model rate limit exceeded: ${message}`, "RATE_LIMIT_ERROR", { status, cause, retryable: true });
  }
  if (status !== undefined && (status >= 500 || status === 408)) {
    return new ChatClientError(`Chat model server error: ${message}`, "SERVER_ERROR", { status, cause, retryable: true });
  }
  if (status !== undefined) {
    return new ChatClientError(`Chat model request rejected: ${message}`, "CLIENT_ERROR", { status, cause });
  }
  const lower = message.toLowerCase();
  const transient = ["econnrefused", "econnreset", "etimedout", "timeout", "enotfound"].some((pattern) =>
    lower.includes(pattern)
  );
  return new ChatClientError(`Chat model request failed: ${message}`, transient ? "NETWORK_ERROR" : "UNKNOWN_ERROR", {
    cause,
    retryable: transient,
  });
}

/**
 * Single-turn chat completions with retry
 *
 * @example
 * ```typescript
 * const chat = new OpenAIChatClient({ apiKey: config.openai.apiKey, model: "gpt-4o-mini" });
 * const answer = await chat.complete("List the people in: Tom Hanks met Meg Ryan.");
 * ```
 */
export class OpenAIChatClient implements ChatClient {
  readonly model: string;

  private readonly client: OpenAIChatApi;
  private readonly config: OpenAIChatClientConfig;
  private readonly retry: RetryConfig;
  private _logger: pino.Logger | null = null;

  /**
   * @param config - API key, model and request settings
   * @param client - SDK stand-in; a real `OpenAI` client is created when omitted
   */
  constructor(config: OpenAIChatClientConfig, client?: OpenAIChatApi) {
    this.config = config;
    this.model = config.model;
    this.retry = config.retry ?? DEFAULT_RETRY_CONFIG;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        timeout: config.timeoutMs ?? 60000,
        maxRetries: 0,
      });
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("extraction:chat");
    }
    return this._logger;
  }

  /**
   * Send `prompt` as a single user message
   *
   * @param prompt - Full prompt text
   * @param options - Abort signal that cancels the request and further retries
   * @returns Content of the first choice; empty when the model returned none
   * @throws {ChatClientError} once retries are exhausted or on a non-retryable failure
   */
  async complete(prompt: string, options: ExtractionCallOptions = {}): Promise<string> {
    const startTime = Date.now();

    const content = await withRetry(
      async () => {
        try {
          const result = await this.client.chat.completions.create(
            {
              model: this.model,
              messages: [{ role: "user", content: prompt }],
              temperature: this.config.temperature ?? 0.1,
              max_tokens: this.config.maxTokens ?? 4000,
            },
            options.signal ? { signal: options.signal } : undefined
          );
          return result.choices[0]?.message.content ?? "";
        } catch (error) {
          throw toChatClientError(error);
        }
      },
      {
        maxRetries: this.retry.maxRetries,
        shouldRetry: (error) => error instanceof ChatClientError && error.retryable,
        calculateBackoff: createExponentialBackoff(this.retry),
        onRetry: createRetryLogger(this.logger, "chat completion", this.retry.maxRetries),
        signal: options.signal,
      }
    );

    this.logger.debug(
      { model: this.model, promptChars: prompt.length, answerChars: content.length, durationMs: Date.now() - startTime },
      "Chat completion finished"
    );
    return content;
  }
}
