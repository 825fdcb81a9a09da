/**
 * Record chunker
 *
 * Turns decoded records into {@link TextChunk}s. Rows and JSON items become
 * one chunk each; free-text blocks are packed line by line up to the
 * character budget, with whole trailing lines repeated at the start of the
 * next chunk as overlap.
 *
 * @module ingestion/record-chunker
 */

import crypto from "node:crypto";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import type { RowRecord, SourceRecord, TextRecord } from "../documents/types.js";
import type { ChunkerConfig, TextChunk } from "./types.js";
import { ChunkerConfigError } from "./errors.js";

interface ChunkBoundary {
  lines: string[];
  /** 1-based */
  startLine: number;
  /** 1-based, inclusive */
  endLine: number;
}

/**
 * Rough token count at four characters per token
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** SHA-256 of the chunk text, hex-encoded */
function computeContentHash(content: string): string {
  return crypto.createHash("sha256").update(content, "utf8").digest("hex");
}

/**
 * Trailing lines of `lines` whose joined length fits in `overlapChars`.
 * At least one line is taken when any overlap is requested.
 */
function getOverlapLines(lines: readonly string[], overlapChars: number): string[] {
  if (overlapChars <= 0) {
    return [];
  }

  const overlap: string[] = [];
  let chars = 0;

  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i] ?? "";
    const lineChars = line.length + 1;
    if (chars + lineChars > overlapChars && overlap.length > 0) {
      break;
    }
    overlap.unshift(line);
    chars += lineChars;
  }

  return overlap;
}

/**
 * Render a tabular row as `column: value` lines, skipping empty cells
 *
 * @example
 * ```typescript
 * renderRow({ kind: "row", index: 0, values: { title: "Big", year: "1988", note: "" } });
 * // "title: Big\nyear: 1988"
 * ```
 */
export function renderRow(record: RowRecord): string {
  return Object.entries(record.values)
    .filter(([, value]) => value.trim() !== "")
    .map(([column, value]) => `${column}: ${value}`)
    .join("\n");
}

function renderObject(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value, null, 2) ?? "null";
}

/**
 * Splits decoded records into overlapping text chunks
 *
 * Text records and rendered objects longer than the chunk size are split on
 * line boundaries, with up to `chunkOverlap` characters carried into the next
 * chunk. A row becomes a single `column: value` chunk.
 *
 * @example
 * ```typescript
 * const chunker = new RecordChunker({ chunkSize: 500, chunkOverlap: 50 });
 * const chunks = chunker.chunkRecords(records, "notes.md");
 * ```
 */
export class RecordChunker {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private _logger: pino.Logger | null = null;

  /**
   * @param config - Chunk size and overlap in characters; 1000 and 200 by default
   * @throws {ChunkerConfigError} when sizes are not positive or overlap is
   * not smaller than the chunk size
   */
  constructor(config?: ChunkerConfig) {
    this.chunkSize = config?.chunkSize ?? 1000;
    this.chunkOverlap = config?.chunkOverlap ?? 200;

    if (!Number.isInteger(this.chunkSize) || this.chunkSize <= 0) {
      throw new ChunkerConfigError(
        `Chunk size must be a positive integer (got ${this.chunkSize})`,
        "chunkSize"
      );
    }
    if (this.chunkOverlap < 0 || this.chunkOverlap >= this.chunkSize) {
      throw new ChunkerConfigError(
        `Chunk overlap (${this.chunkOverlap}) must be between 0 and chunk size (${this.chunkSize})`,
        "chunkOverlap"
      );
    }
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("ingestion:record-chunker");
    }
    return this._logger;
  }

  getConfig(): { chunkSize: number; chunkOverlap: number } {
    return { chunkSize: this.chunkSize, chunkOverlap: this.chunkOverlap };
  }

  /**
   * Chunk every record of one document, numbering chunks document-wide
   *
   * @param records - Decoded records in document order
   * @param filename - Recorded on each chunk as its source
   * @returns Chunks with ids `<filename>:<index>`, indexed across the document
   */
  chunkRecords(records: readonly SourceRecord[], filename: string): TextChunk[] {
    const chunks: TextChunk[] = [];

    const push = (
      content: string,
      record: SourceRecord,
      span?: { startLine: number; endLine: number }
    ): void => {
      const index = chunks.length;
      chunks.push({
        id: `${filename}:${index}`,
        index,
        content,
        sourceKind: record.kind,
        sourceIndex: record.index,
        ...span,
        charCount: content.length,
        tokenEstimate: estimateTokens(content),
        contentHash: computeContentHash(content),
      });
    };

    for (const record of records) {
      switch (record.kind) {
        case "row": {
          const content = renderRow(record);
          if (content !== "") {
            push(content, record);
          }
          break;
        }
        case "object":
          for (const boundary of this.splitText(renderObject(record.value))) {
            push(boundary.lines.join("\n"), record);
          }
          break;
        case "text":
          for (const boundary of this.splitText(record.content)) {
            push(boundary.lines.join("\n"), record, this.toRecordSpan(record, boundary));
          }
          break;
      }
    }

    this.logger.debug(
      { filename, records: records.length, chunks: chunks.length },
      "Chunked records"
    );

    return chunks;
  }

  private toRecordSpan(
    record: TextRecord,
    boundary: ChunkBoundary
  ): { startLine: number; endLine: number } {
    const offset = record.startLine - 1;
    return { startLine: boundary.startLine + offset, endLine: boundary.endLine + offset };
  }

  /**
   * Pack lines into boundaries of at most `chunkSize` characters. A single
   * line longer than the budget is cut into budget-sized pieces first.
   */
  private splitText(text: string): ChunkBoundary[] {
    if (text.trim() === "") {
      return [];
    }

    const lines: Array<{ text: string; line: number }> = [];
    text.split("\n").forEach((line, position) => {
      if (line.length <= this.chunkSize) {
        lines.push({ text: line, line: position + 1 });
        return;
      }
      for (let start = 0; start < line.length; start += this.chunkSize) {
        lines.push({ text: line.slice(start, start + this.chunkSize), line: position + 1 });
      }
    });

    const boundaries: ChunkBoundary[] = [];
    let current: Array<{ text: string; line: number }> = [];
    let currentChars = 0;

    for (const entry of lines) {
      const entryChars = entry.text.length + (current.length > 0 ? 1 : 0);
      if (currentChars + entryChars > this.chunkSize && current.length > 0) {
        boundaries.push(this.toBoundary(current));

        const overlapTexts = getOverlapLines(
          current.map((item) => item.text),
          this.chunkOverlap
        );
        const carried = current.slice(current.length - overlapTexts.length);
        current = [...carried, entry];
        currentChars = current.map((item) => item.text).join("\n").length;
        // Overlap must never push a chunk past the budget
        while (currentChars > this.chunkSize && current.length > 1) {
          current.shift();
          currentChars = current.map((item) => item.text).join("\n").length;
        }
      } else {
        current.push(entry);
        currentChars += entryChars;
      }
    }

    if (current.length > 0) {
      boundaries.push(this.toBoundary(current));
    }

    return boundaries;
  }

  private toBoundary(entries: ReadonlyArray<{ text: string; line: number }>): ChunkBoundary {
    return {
      lines: entries.map((entry) => entry.text),
      startLine: entries[0]?.line ?? 1,
      endLine: entries[entries.length - 1]?.line ?? 1,
    };
  }
}
