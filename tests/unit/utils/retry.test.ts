/**
 * Unit tests for retry utility
 *
 * Tests exponential backoff, conditional retry, abort handling and retry callbacks.
 */

import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import {
  withRetry,
  defaultExponentialBackoff,
  createRetryConfigFromEnv,
  createExponentialBackoff,
  createRetryLogger,
  createRetryOptions,
  DEFAULT_RETRY_CONFIG,
  type RetryOptions,
} from "../../../src/utils/retry.js";
import { initializeLogger, getComponentLogger, resetLogger } from "../../../src/logging/index.js";
import { createLogCapture } from "../../helpers/log-capture.js";

const fast = (): number => 1;

describe("defaultExponentialBackoff", () => {
  test("doubles from one second", () => {
    expect(defaultExponentialBackoff(0)).toBe(1000);
    expect(defaultExponentialBackoff(1)).toBe(2000);
    expect(defaultExponentialBackoff(3)).toBe(8000);
  });
});

describe("createExponentialBackoff", () => {
  test("grows by the multiplier and caps at maxDelayMs", () => {
    const backoff = createExponentialBackoff({
      initialDelayMs: 100,
      maxDelayMs: 500,
      backoffMultiplier: 3,
    });
    const error = new Error("x");

    expect(backoff(0, error)).toBe(100);
    expect(backoff(1, error)).toBe(300);
    expect(backoff(2, error)).toBe(500);
  });
});

describe("withRetry - success scenarios", () => {
  test("returns result on first attempt", async () => {
    const operation = vi.fn(() => Promise.resolve("success"));

    const result = await withRetry(operation, { maxRetries: 3 });

    expect(result).toBe("success");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("succeeds on final retry attempt", async () => {
    let attempts = 0;
    const operation = vi.fn(async () => {
      attempts++;
      if (attempts <= 3) throw new Error("Attempts 1-3 fail");
      return "success";
    });

    const result = await withRetry(operation, { maxRetries: 3, calculateBackoff: fast });

    expect(result).toBe("success");
    expect(operation).toHaveBeenCalledTimes(4);
  });
});

describe("withRetry - failure scenarios", () => {
  test("throws last error after exhausting retries", async () => {
    let attempts = 0;
    const operation = vi.fn(async () => {
      attempts++;
      throw new Error(`Failure ${attempts}`);
    });

    await expect(withRetry(operation, { maxRetries: 2, calculateBackoff: fast })).rejects.toThrow(
      "Failure 3"
    );
    expect(operation).toHaveBeenCalledTimes(3);
  });

  test("throws immediately with maxRetries=0", async () => {
    const operation = vi.fn(() => Promise.reject(new Error("Immediate failure")));

    await expect(withRetry(operation, { maxRetries: 0 })).rejects.toThrow("Immediate failure");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("wraps non-Error rejections", async () => {
    const operation = (): Promise<string> => Promise.reject("plain string");

    await expect(withRetry(operation, { maxRetries: 0 })).rejects.toThrow("plain string");
  });
});

describe("withRetry - shouldRetry conditional logic", () => {
  class RetryableError extends Error {}
  class NonRetryableError extends Error {}

  test("switches from retryable to non-retryable error", async () => {
    let attempts = 0;
    const operation = vi.fn(async () => {
      attempts++;
      if (attempts === 1) throw new RetryableError("Retry this");
      throw new NonRetryableError("Don't retry this");
    });

    const options: RetryOptions = {
      maxRetries: 3,
      shouldRetry: (error) => error instanceof RetryableError,
      calculateBackoff: fast,
    };

    await expect(withRetry(operation, options)).rejects.toThrow("Don't retry this");
    expect(operation).toHaveBeenCalledTimes(2);
  });
});

describe("withRetry - onRetry callback", () => {
  test("receives attempt, error and delay before each retry", async () => {
    let attempts = 0;
    const operation = vi.fn(async () => {
      attempts++;
      if (attempts <= 2) throw new Error(`Attempt ${attempts}`);
      return "success";
    });
    const onRetry = vi.fn();

    await withRetry(operation, {
      maxRetries: 3,
      calculateBackoff: createExponentialBackoff({
        initialDelayMs: 1,
        maxDelayMs: 100,
        backoffMultiplier: 2,
      }),
      onRetry,
    });

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[0]).toBe(0);
    expect(onRetry.mock.calls[0]?.[2]).toBe(1);
    expect(onRetry.mock.calls[1]?.[0]).toBe(1);
    expect(onRetry.mock.calls[1]?.[1]).toEqual(new Error("Attempt 2"));
    expect(onRetry.mock.calls[1]?.[2]).toBe(2);
  });

  test("is not called after the final failure", async () => {
    const onRetry = vi.fn();
    const operation = vi.fn(() => Promise.reject(new Error("Always fails")));

    await expect(
      withRetry(operation, { maxRetries: 2, onRetry, calculateBackoff: fast })
    ).rejects.toThrow("Always fails");

    expect(onRetry).toHaveBeenCalledTimes(2);
  });
});

describe("withRetry - abort signal", () => {
  test("does not retry once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(() => Promise.reject(new Error("transient")));

    await expect(
      withRetry(operation, { maxRetries: 5, calculateBackoff: fast, signal: controller.signal })
    ).rejects.toThrow("transient");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("abort during backoff ends the wait and rethrows", async () => {
    const controller = new AbortController();
    const operation = vi.fn(() => Promise.reject(new Error("transient")));

    const pending = withRetry(operation, {
      maxRetries: 5,
      calculateBackoff: () => 60_000,
      onRetry: () => controller.abort(),
      signal: controller.signal,
    });

    await expect(pending).rejects.toThrow("transient");
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe("createRetryOptions", () => {
  test("takes maxRetries and backoff from config", () => {
    const options = createRetryOptions({
      maxRetries: 4,
      initialDelayMs: 10,
      maxDelayMs: 15,
      backoffMultiplier: 2,
    });

    expect(options.maxRetries).toBe(4);
    expect(options.calculateBackoff?.(0, new Error("x"))).toBe(10);
    expect(options.calculateBackoff?.(1, new Error("x"))).toBe(15);
  });

  test("applies overrides", () => {
    const shouldRetry = (): boolean => false;
    const options = createRetryOptions(DEFAULT_RETRY_CONFIG, { shouldRetry });

    expect(options.shouldRetry).toBe(shouldRetry);
    expect(options.maxRetries).toBe(3);
  });
});

describe("createRetryConfigFromEnv", () => {
  test("returns defaults when no variables are set", () => {
    expect(createRetryConfigFromEnv({})).toEqual(DEFAULT_RETRY_CONFIG);
  });

  test("reads every variable", () => {
    expect(
      createRetryConfigFromEnv({
        MAX_RETRIES: "5",
        RETRY_INITIAL_DELAY_MS: "250",
        RETRY_MAX_DELAY_MS: "4000",
        RETRY_BACKOFF_MULTIPLIER: "1.5",
      })
    ).toEqual({ maxRetries: 5, initialDelayMs: 250, maxDelayMs: 4000, backoffMultiplier: 1.5 });
  });

  test("falls back on invalid values", () => {
    const config = createRetryConfigFromEnv({
      MAX_RETRIES: "-1",
      RETRY_INITIAL_DELAY_MS: "abc",
      RETRY_BACKOFF_MULTIPLIER: "0",
    });

    expect(config.maxRetries).toBe(3);
    expect(config.initialDelayMs).toBe(1000);
    expect(config.backoffMultiplier).toBe(2);
  });
});

describe("createRetryLogger", () => {
  const capture = createLogCapture();

  beforeEach(() => {
    capture.clear();
    initializeLogger({ level: "warn", format: "json", stream: capture.stream });
  });

  afterEach(() => {
    resetLogger();
  });

  test("writes one warn line per retry", () => {
    const onRetry = createRetryLogger(getComponentLogger("test"), "Neo4j query", 3);

    onRetry(0, new Error("connection reset"), 1000);

    const [entry] = capture.getByLevel("warn");
    expect(entry?.msg).toBe("Retrying Neo4j query");
    expect(entry?.["attempt"]).toBe(1);
    expect(entry?.["maxRetries"]).toBe(3);
    expect(entry?.["delayMs"]).toBe(1000);
    expect(entry?.["error"]).toBe("connection reset");
  });
});
