/**
 * Unit tests for logger factory
 *
 * Tests initialization, component loggers, levels and redaction.
 */

import { describe, test, expect, afterEach } from "vitest";
import {
  initializeLogger,
  isLoggerInitialized,
  getComponentLogger,
  getRootLogger,
  resetLogger,
  LOG_LEVELS,
} from "../../../src/logging/index.js";
import { createLogCapture } from "../../helpers/log-capture.js";

describe("Logger Factory", () => {
  afterEach(() => {
    resetLogger();
  });

  describe("initializeLogger", () => {
    test("initializes with JSON format", () => {
      expect(() => initializeLogger({ level: "info", format: "json" })).not.toThrow();
      expect(isLoggerInitialized()).toBe(true);
      expect(getRootLogger().level).toBe("info");
    });

    test("throws if initialized twice", () => {
      initializeLogger({ level: "info", format: "json" });

      expect(() => initializeLogger({ level: "debug", format: "json" })).toThrow(
        "Logger already initialized"
      );
    });

    test("accepts every level", () => {
      for (const level of LOG_LEVELS) {
        resetLogger();
        initializeLogger({ level, format: "json" });
        expect(getRootLogger().level).toBe(level);
      }
    });
  });

  describe("getRootLogger", () => {
    test("throws before initialization", () => {
      expect(isLoggerInitialized()).toBe(false);
      expect(() => getRootLogger()).toThrow("Logger not initialized");
    });
  });

  describe("getComponentLogger", () => {
    test("tags every line with the component", () => {
      const capture = createLogCapture();
      initializeLogger({ level: "info", format: "json", stream: capture.stream });

      getComponentLogger("pipeline:executor").info({ stage: "Parsing" }, "Stage started");

      const [entry] = capture.getByComponent("pipeline:executor");
      expect(entry?.msg).toBe("Stage started");
      expect(entry?.level).toBe("info");
      expect(entry?.["stage"]).toBe("Parsing");
      expect(entry?.["requestId"]).toBeUndefined();
    });

    test("adds requestId when given", () => {
      const capture = createLogCapture();
      initializeLogger({ level: "info", format: "json", stream: capture.stream });

      getComponentLogger("services:orchestrator", "doc-1").info("Ingestion started");

      expect(capture.getAll()[0]?.["requestId"]).toBe("doc-1");
    });

    test("drops lines below the configured level", () => {
      const capture = createLogCapture();
      initializeLogger({ level: "warn", format: "json", stream: capture.stream });
      const logger = getComponentLogger("test");

      logger.info("hidden");
      logger.warn("shown");

      expect(capture.getAll().map((entry) => entry.msg)).toEqual(["shown"]);
    });

    test("writes ISO timestamps", () => {
      const capture = createLogCapture();
      initializeLogger({ level: "info", format: "json", stream: capture.stream });

      getComponentLogger("test").info("tick");

      expect(capture.getAll()[0]?.time).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });
  });
});
