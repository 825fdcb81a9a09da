/**
 * Retry with exponential backoff
 *
 * Used around every collaborator call that crosses a process boundary
 * (Neo4j, OpenAI, ChromaDB). Retries stop early when the caller's
 * AbortSignal fires so that a pipeline deadline is not extended by backoff.
 *
 * @module utils/retry
 */

import type pino from "pino";

/**
 * Backoff configuration
 *
 * @example
 * ```typescript
 * const config: RetryConfig = {
 *   maxRetries: 3,
 *   initialDelayMs: 1000,
 *   maxDelayMs: 60000,
 *   backoffMultiplier: 2,
 * };
 * // Delays: 1s → 2s → 4s (capped at 60s)
 * ```
 */
export interface RetryConfig {
  /**
   * Maximum number of retry attempts (0 = no retries, just the initial attempt)
   * @default 3
   */
  maxRetries: number;

  /**
   * Initial delay in milliseconds before the first retry
   * @default 1000
   */
  initialDelayMs: number;

  /**
   * Maximum delay in milliseconds (caps exponential growth)
   * @default 60000
   */
  maxDelayMs: number;

  /**
   * Multiplier applied to the delay after each retry attempt
   * @default 2
   */
  backoffMultiplier: number;
}

/**
 * Default retry configuration values
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
};

/**
 * Parse an environment variable as a non-negative integer
 *
 * @param value - Environment variable value (may be undefined)
 * @param defaultVal - Returned when the value is unset, NaN or negative
 * @returns Parsed non-negative integer or default
 */
function parseNonNegativeInt(value: string | undefined, defaultVal: number): number {
  if (value === undefined || value === "") {
    return defaultVal;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? defaultVal : parsed;
}

/**
 * Parse an environment variable as a positive float
 *
 * @param value - Environment variable value (may be undefined)
 * @param defaultVal - Returned when the value is unset, NaN, zero or negative
 * @returns Parsed positive float or default
 */
function parsePositiveFloat(value: string | undefined, defaultVal: number): number {
  if (value === undefined || value === "") {
    return defaultVal;
  }
  const parsed = parseFloat(value);
  return isNaN(parsed) || parsed <= 0 ? defaultVal : parsed;
}

/**
 * Load retry configuration from the environment
 *
 * Reads `MAX_RETRIES`, `RETRY_INITIAL_DELAY_MS`, `RETRY_MAX_DELAY_MS` and
 * `RETRY_BACKOFF_MULTIPLIER`. Invalid values fall back to defaults.
 *
 * @param env - Variables to read; `process.env` by default
 * @returns RetryConfig with values from the environment or defaults
 */
export function createRetryConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RetryConfig {
  return {
    maxRetries: parseNonNegativeInt(env["MAX_RETRIES"], DEFAULT_RETRY_CONFIG.maxRetries),
    initialDelayMs: parseNonNegativeInt(
      env["RETRY_INITIAL_DELAY_MS"],
      DEFAULT_RETRY_CONFIG.initialDelayMs
    ),
    maxDelayMs: parseNonNegativeInt(env["RETRY_MAX_DELAY_MS"], DEFAULT_RETRY_CONFIG.maxDelayMs),
    backoffMultiplier: parsePositiveFloat(
      env["RETRY_BACKOFF_MULTIPLIER"],
      DEFAULT_RETRY_CONFIG.backoffMultiplier
    ),
  };
}

/**
 * Build a backoff function: `min(initialDelayMs * multiplier^attempt, maxDelayMs)`
 *
 * @param config - Retry configuration with backoff parameters
 * @returns A function that calculates the delay for each 0-based attempt
 */
export function createExponentialBackoff(
  config: Pick<RetryConfig, "initialDelayMs" | "maxDelayMs" | "backoffMultiplier">
): (attempt: number, error: Error) => number {
  const { initialDelayMs, maxDelayMs, backoffMultiplier } = config;

  return (attempt: number, _error: Error): number => {
    const delay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
    return Math.min(delay, maxDelayMs);
  };
}

/**
 * onRetry callback that writes one structured warn line per retry
 *
 * @param logger - Component logger to write to
 * @param operation - Operation name used in the log message
 * @param maxRetries - Reported alongside the 1-based attempt number
 *
 * @example
 * ```typescript
 * const onRetry = createRetryLogger(logger, "Neo4j entity upsert", 3);
 * await withRetry(operation, { maxRetries: 3, onRetry });
 * ```
 */
export function createRetryLogger(
  logger: pino.Logger,
  operation: string,
  maxRetries: number
): (attempt: number, error: Error, delayMs: number) => void {
  return (attempt: number, error: Error, delayMs: number): void => {
    logger.warn(
      {
        attempt: attempt + 1,
        maxRetries,
        delayMs,
        error: error.message,
        errorType: error.name,
      },
      `Retrying ${operation}`
    );
  };
}

/**
 * Options for {@link withRetry}
 */
export interface RetryOptions {
  /** Retry attempts after the first try (0 = no retries) */
  maxRetries: number;

  /**
   * Decide whether an error is worth another attempt
   * @default () => true
   */
  shouldRetry?: (error: Error) => boolean;

  /**
   * Delay before retry `attempt` (0-based)
   * @default 2^attempt * 1000ms
   */
  calculateBackoff?: (attempt: number, error: Error) => number;

  /**
   * Called before each retry sleep
   *
   * Receives the 0-based attempt that failed, its error and the delay about
   * to be applied.
   */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;

  /** Stops further attempts once aborted; the last error is rethrown */
  signal?: AbortSignal;
}

/**
 * 1s, 2s, 4s, ... with no cap
 */
export function defaultExponentialBackoff(attempt: number): number {
  return Math.pow(2, attempt) * 1000;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Run an async operation, retrying failures per `options`
 *
 * Non-Error rejections are wrapped in an Error before `shouldRetry` sees them.
 *
 * @param operation - Async function to run; called once per attempt
 * @param options - Retry count, predicate, backoff, logging hook and abort signal
 * @returns Result of the first successful attempt
 * @throws the last error once retries are exhausted, `shouldRetry` declines,
 * or the signal has been aborted
 *
 * @example
 * ```typescript
 * const ids = await withRetry(() => gateway.upsertEntities(batch), {
 *   maxRetries: 3,
 *   shouldRetry: (error) => isRetryableGraphError(error),
 *   signal: context.signal,
 * });
 * ```
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    maxRetries,
    shouldRetry = () => true,
    calculateBackoff = defaultExponentialBackoff,
    onRetry,
    signal,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = toError(error);

      if (attempt >= maxRetries || !shouldRetry(lastError) || signal?.aborted) {
        throw lastError;
      }

      const delayMs = calculateBackoff(attempt, lastError);
      onRetry?.(attempt, lastError, delayMs);

      await sleep(delayMs, signal);
      if (signal?.aborted) {
        throw lastError;
      }
    }
  }

  throw lastError ?? new Error("Retry loop completed without success or error");
}

/**
 * Resolves after `ms`, or early when `signal` aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Build RetryOptions from a RetryConfig plus per-call overrides
 *
 * @param config - Retry count and backoff parameters
 * @param overrides - Predicate, logger and signal for this call site
 */
export function createRetryOptions(
  config: RetryConfig,
  overrides?: Partial<Omit<RetryOptions, "maxRetries">>
): RetryOptions {
  return {
    maxRetries: config.maxRetries,
    calculateBackoff: createExponentialBackoff(config),
    ...overrides,
  };
}
