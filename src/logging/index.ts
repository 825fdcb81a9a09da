/**
 * Logging Module - Public API
 *
 * Structured logging on pino with secret redaction and component context.
 *
 * ```typescript
 * import { initializeLogger, getComponentLogger } from "./logging/index.js";
 *
 * initializeLogger({ level: "info", format: "pretty" });
 * const logger = getComponentLogger("services:orchestrator");
 * logger.info({ documentId }, "Ingestion started");
 * ```
 *
 * Environment: `LOG_LEVEL` (default info) and `LOG_FORMAT` (json|pretty, default pretty).
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  isLoggerInitialized,
  getComponentLogger,
  getRootLogger,
  resetLogger,
} from "./logger-factory.js";

export { REDACT_PATHS, REDACT_OPTIONS, SECRET_PATTERNS, looksLikeSecret } from "./redactors.js";
