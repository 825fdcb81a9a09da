/**
 * Logger Factory
 *
 * Pino-based root logger plus component-scoped child loggers. Output goes to
 * stderr (or a supplied stream) so that CLI result output on stdout is never
 * interleaved with log lines.
 *
 * @module logging/logger-factory
 */

import pino from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";
import { REDACT_OPTIONS } from "./redactors.js";

let rootLogger: pino.Logger | null = null;

function baseOptions(level: LoggerConfig["level"]): pino.LoggerOptions {
  return {
    level,
    redact: REDACT_OPTIONS,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * @internal
 */
function createRootLogger(config: LoggerConfig): pino.Logger {
  const options = baseOptions(config.level);

  if (config.stream) {
    return pino(options, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Initialize the global logger
 *
 * Call once at startup. A second call throws; tests call {@link resetLogger}
 * between cases.
 *
 * @example
 * ```typescript
 * initializeLogger({ level: "info", format: "json" });
 * const logger = getComponentLogger("cli");
 * ```
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);
    rootLogger.debug({ level: config.level, format: config.format }, "Logger initialized");
  } catch (error) {
    // pino-pretty missing or transport failed to start: plain JSON on stderr
    rootLogger = pino(baseOptions(config.level), pino.destination(2));
    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Whether {@link initializeLogger} has run
 */
export function isLoggerInitialized(): boolean {
  return rootLogger !== null;
}

/**
 * Root logger instance
 *
 * @throws Error if the logger has not been initialized
 * @internal most code should use {@link getComponentLogger}
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return rootLogger;
}

/**
 * Child logger carrying a component name (and optional request id) on every line
 *
 * @example
 * ```typescript
 * const logger = getComponentLogger("pipeline:executor", document.id);
 * logger.info({ stage: "Parsing" }, "Stage started");
 * ```
 */
export function getComponentLogger(component: string, requestId?: string): pino.Logger {
  const context: ComponentContext = {
    component,
    ...(requestId && { requestId }),
  };

  return getRootLogger().child(context);
}

/**
 * Clear the root logger so it can be initialized again. Tests only.
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}
