/**
 * Free-text decoder (plain text and Markdown)
 *
 * @module documents/decoders/PlainTextDecoder
 */

import type pino from "pino";
import { getComponentLogger } from "../../logging/index.js";
import type { DecodeResult, Decoder, DocumentFormat, TextRecord } from "../types.js";
import { readSourceFile, toText } from "./source-file.js";

const SAMPLE_LINE_COUNT = 5;

/**
 * A heading found by {@link extractHeadings}
 */
export interface MarkdownHeading {
  level: number;
  text: string;
  line: number;
}

/**
 * Split text into blank-line separated blocks with 1-based line spans.
 * Blocks are trimmed; whitespace-only blocks are dropped.
 *
 * @example
 * ```typescript
 * splitParagraphs("a\nb\n\nc");
 * // [{ kind: "text", index: 0, content: "a\nb", startLine: 1, endLine: 2 },
 * //  { kind: "text", index: 1, content: "c", startLine: 4, endLine: 4 }]
 * ```
 */
export function splitParagraphs(text: string): TextRecord[] {
  const lines = text.split("\n");
  const records: TextRecord[] = [];
  let blockStart = -1;

  const flush = (endExclusive: number): void => {
    if (blockStart < 0) {
      return;
    }
    const content = lines.slice(blockStart, endExclusive).join("\n").trim();
    if (content !== "") {
      records.push({
        kind: "text",
        index: records.length,
        content,
        startLine: blockStart + 1,
        endLine: endExclusive,
      });
    }
    blockStart = -1;
  };

  lines.forEach((line, position) => {
    if (line.trim() === "") {
      flush(position);
    } else if (blockStart < 0) {
      blockStart = position;
    }
  });
  flush(lines.length);

  return records;
}

/**
 * ATX headings (`#` to `######`), skipping fenced code blocks
 */
export function extractHeadings(text: string): MarkdownHeading[] {
  const headings: MarkdownHeading[] = [];
  let inFence = false;

  text.split("\n").forEach((line, position) => {
    if (/^\s*(```|~~~)/.test(line)) {
      inFence = !inFence;
      return;
    }
    if (inFence) {
      return;
    }
    const match = /^(#{1,6})\s+(.+?)\s*#*\s*$/.exec(line);
    if (match?.[1] && match[2]) {
      headings.push({ level: match[1].length, text: match[2], line: position + 1 });
    }
  });

  return headings;
}

/**
 * Text statistics shared by the free-text decoders
 *
 * @param text - Normalized document text
 * @returns Character, word and line counts plus the first lines as a sample
 */
export function describeText(text: string): Record<string, unknown> {
  const lines = text.split("\n");
  const words = text.split(/\s+/).filter((word) => word !== "");
  return {
    lineCount: lines.length,
    charCount: text.length,
    wordCount: words.length,
    sampleLines: lines.filter((line) => line.trim() !== "").slice(0, SAMPLE_LINE_COUNT),
  };
}

/**
 * Decodes `txt` and `markdown` files into paragraph {@link TextRecord}s
 */
export class PlainTextDecoder implements Decoder {
  readonly formats: readonly DocumentFormat[] = ["txt", "markdown"];

  private _logger: pino.Logger | null = null;

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("documents:decoder:text");
    }
    return this._logger;
  }

  async decode(filePath: string, format: DocumentFormat): Promise<DecodeResult> {
    const source = await readSourceFile(filePath);
    const text = toText(source.buffer);
    const records = splitParagraphs(text);

    this.logger.debug(
      { filename: source.filename, format, paragraphs: records.length },
      "Decoded text file"
    );

    return {
      records,
      metadata: {
        filename: source.filename,
        sizeBytes: source.sizeBytes,
        format,
        ...describeText(text),
        paragraphCount: records.length,
        ...(format === "markdown" && { headings: extractHeadings(text) }),
      },
    };
  }
}
