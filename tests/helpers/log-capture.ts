/**
 * Log Capture Helper
 *
 * Collects the JSON lines a pino logger writes so tests can assert on
 * structured log output.
 *
 * @module tests/helpers/log-capture
 */

import { Writable } from "node:stream";
import type { LogLevel } from "../../src/logging/types.js";

/**
 * Captured log entry (levels are string labels)
 */
export interface LogEntry {
  level: string;
  time?: string;
  component?: string;
  msg: string;
  [key: string]: unknown;
}

function isLogEntry(value: unknown): value is LogEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "string" &&
    "msg" in value &&
    typeof value.msg === "string"
  );
}

export class LogCapture {
  private logs: LogEntry[] = [];
  readonly stream: Writable;

  constructor() {
    this.stream = new Writable({
      write: (chunk: Buffer | string, _encoding, callback) => {
        const text = typeof chunk === "string" ? chunk : chunk.toString();
        for (const line of text.split("\n")) {
          if (!line.trim()) continue;
          const parsed: unknown = JSON.parse(line);
          if (isLogEntry(parsed)) {
            this.logs.push(parsed);
          }
        }
        callback();
      },
    });
  }

  getAll(): LogEntry[] {
    return [...this.logs];
  }

  getByComponent(component: string): LogEntry[] {
    return this.logs.filter((log) => log.component === component);
  }

  getByLevel(level: LogLevel): LogEntry[] {
    return this.logs.filter((log) => log.level === level);
  }

  /**
   * Entries carrying a `metric` field with this name
   */
  getMetric(metric: string): LogEntry[] {
    return this.logs.filter((log) => log["metric"] === metric);
  }

  find(predicate: (log: LogEntry) => boolean): LogEntry | undefined {
    return this.logs.find(predicate);
  }

  clear(): void {
    this.logs = [];
  }
}

/**
 * @example
 * ```typescript
 * const capture = createLogCapture();
 * initializeLogger({ level: "debug", format: "json", stream: capture.stream });
 *
 * await pipeline.execute(context);
 *
 * expect(capture.getMetric("pipeline.duration_ms")).toHaveLength(1);
 * ```
 */
export function createLogCapture(): LogCapture {
  return new LogCapture();
}
