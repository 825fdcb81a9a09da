/**
 * Unit tests for RecordChunker
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { RecordChunker, renderRow, estimateTokens } from "../../../src/ingestion/record-chunker.js";
import { ChunkerConfigError } from "../../../src/ingestion/errors.js";
import type { SourceRecord } from "../../../src/documents/types.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";

beforeEach(() => {
  initializeLogger({ level: "silent", format: "json" });
});

afterEach(() => {
  resetLogger();
});

describe("renderRow", () => {
  test("renders column: value lines and skips empty cells", () => {
    expect(renderRow({ kind: "row", index: 0, values: { title: "Big", year: "1988", note: " " } })).toBe(
      "title: Big\nyear: 1988"
    );
  });
});

describe("estimateTokens", () => {
  test("is a quarter of the characters, rounded up", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcde")).toBe(2);
  });
});

describe("RecordChunker configuration", () => {
  test("defaults to 1000 with 200 overlap", () => {
    expect(new RecordChunker().getConfig()).toEqual({ chunkSize: 1000, chunkOverlap: 200 });
  });

  test("rejects a non-positive chunk size", () => {
    expect(() => new RecordChunker({ chunkSize: 0 })).toThrow(ChunkerConfigError);
  });

  test("rejects overlap not smaller than the chunk size", () => {
    try {
      new RecordChunker({ chunkSize: 100, chunkOverlap: 100 });
      expect.unreachable("constructor should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ChunkerConfigError);
      expect(error instanceof ChunkerConfigError && error.field).toBe("chunkOverlap");
    }
  });
});

describe("RecordChunker.chunkRecords", () => {
  test("one chunk per row, numbered across the document", () => {
    const records: SourceRecord[] = [
      { kind: "row", index: 0, values: { title: "Big", year: "1988" } },
      { kind: "row", index: 1, values: { title: "", year: "" } },
      { kind: "row", index: 2, values: { title: "Splash", year: "1984" } },
    ];

    const chunks = new RecordChunker().chunkRecords(records, "movies.csv");

    expect(chunks.map((chunk) => [chunk.id, chunk.sourceIndex, chunk.content])).toEqual([
      ["movies.csv:0", 0, "title: Big\nyear: 1988"],
      ["movies.csv:1", 2, "title: Splash\nyear: 1984"],
    ]);
    expect(chunks[0]).toMatchObject({
      index: 0,
      sourceKind: "row",
      charCount: 21,
      tokenEstimate: 6,
    });
    expect(chunks[0]?.contentHash).toMatch(/^[0-9a-f]{64}$/);
    expect(chunks[0]?.startLine).toBeUndefined();
  });

  test("renders object records as indented JSON", () => {
    const chunks = new RecordChunker().chunkRecords(
      [
        { kind: "object", index: 0, value: { name: "Tom Hanks" } },
        { kind: "object", index: 1, value: "plain" },
      ],
      "people.json"
    );

    expect(chunks.map((chunk) => chunk.content)).toEqual(['{\n  "name": "Tom Hanks"\n}', "plain"]);
  });

  test("packs text lines with whole-line overlap and source line spans", () => {
    const chunks = new RecordChunker({ chunkSize: 10, chunkOverlap: 3 }).chunkRecords(
      [{ kind: "text", index: 3, content: "aaaa\nbbbb\ncccc", startLine: 5, endLine: 7 }],
      "notes.txt"
    );

    expect(chunks.map((chunk) => [chunk.content, chunk.startLine, chunk.endLine, chunk.sourceIndex])).toEqual([
      ["aaaa\nbbbb", 5, 6, 3],
      ["bbbb\ncccc", 6, 7, 3],
    ]);
  });

  test("cuts a line longer than the budget", () => {
    const chunks = new RecordChunker({ chunkSize: 4, chunkOverlap: 0 }).chunkRecords(
      [{ kind: "text", index: 0, content: "abcdefghij", startLine: 1, endLine: 1 }],
      "long.txt"
    );

    expect(chunks.map((chunk) => chunk.content)).toEqual(["abcd", "efgh", "ij"]);
    expect(chunks.every((chunk) => chunk.startLine === 1 && chunk.endLine === 1)).toBe(true);
  });

  test("never exceeds the chunk size", () => {
    const content = Array.from({ length: 40 }, (_, i) => `line ${i} of the notes`).join("\n");
    const chunks = new RecordChunker({ chunkSize: 100, chunkOverlap: 40 }).chunkRecords(
      [{ kind: "text", index: 0, content, startLine: 1, endLine: 40 }],
      "notes.txt"
    );

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((chunk) => chunk.charCount <= 100)).toBe(true);
    expect(chunks[chunks.length - 1]?.endLine).toBe(40);
  });

  test("returns nothing for no records", () => {
    expect(new RecordChunker().chunkRecords([], "empty.txt")).toEqual([]);
  });
});
