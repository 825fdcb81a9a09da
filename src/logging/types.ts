/**
 * Logging Types
 *
 * @module logging/types
 */

/**
 * Log levels accepted by the logger, most severe first.
 *
 * `silent` suppresses everything and is what the test suite uses.
 */
export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

/**
 * All log levels in severity order (useful for validating env input)
 */
export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default "info"
   */
  level: LogLevel;

  /**
   * Output format
   * - json: one JSON object per line
   * - pretty: colorized output through pino-pretty
   * @default "pretty"
   */
  format: "json" | "pretty";

  /**
   * Custom output stream. Tests pass a capture stream here; when omitted
   * logs go to stderr so stdout stays free for command output.
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Context bound to every line a component logger writes
 */
export interface ComponentContext {
  /**
   * Component name in colon notation, e.g. "pipeline:executor",
   * "documents:decoder:csv", "graph:neo4j"
   */
  component: string;

  /**
   * Optional correlation id. The orchestrator uses the document id so all
   * lines for one ingestion run can be grouped.
   */
  requestId?: string;
}
