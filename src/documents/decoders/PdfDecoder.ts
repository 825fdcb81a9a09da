/**
 * PDF decoder
 *
 * @module documents/decoders/PdfDecoder
 */

import { createRequire } from "node:module";
import type pino from "pino";
import type PdfParse from "pdf-parse";
import { getComponentLogger } from "../../logging/index.js";
import { DecodeError, DecodeTimeoutError } from "../errors.js";
import type { DecodeResult, Decoder, DocumentFormat } from "../types.js";
import { normalizeText, readSourceFile } from "./source-file.js";
import { describeText, splitParagraphs } from "./PlainTextDecoder.js";

// The package entry point runs a self-test when loaded without a parent
// module, so load the library file directly.
const require = createRequire(import.meta.url);
const pdfParse: typeof PdfParse = require("pdf-parse/lib/pdf-parse.js");

export interface PdfDecoderConfig {
  /**
   * Give up on a document that takes longer than this to parse
   * @default 30000
   */
  timeoutMs?: number;
}

/** A non-empty string field of the PDF info dictionary */
function infoString(info: unknown, key: string): string | undefined {
  if (typeof info !== "object" || info === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(info, key);
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

/**
 * Extracts the text layer of a PDF and splits it into paragraph records
 *
 * Metadata adds `pageCount` and, when present in the document info,
 * `title` and `author`.
 */
export class PdfDecoder implements Decoder {
  readonly formats: readonly DocumentFormat[] = ["pdf"];

  private readonly timeoutMs: number;
  private _logger: pino.Logger | null = null;

  constructor(config?: PdfDecoderConfig) {
    this.timeoutMs = config?.timeoutMs ?? 30000;
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("documents:decoder:pdf");
    }
    return this._logger;
  }

  /**
   * Extract the text layer and split it into paragraphs
   *
   * @param filePath - Path of the PDF file
   * @param format - Always "pdf"; echoed into the metadata
   * @throws {FileAccessError} when the file cannot be read
   * @throws {DecodeTimeoutError} when parsing exceeds the configured timeout
   * @throws {DecodeError} for a corrupt or password-protected PDF
   */
  async decode(filePath: string, format: DocumentFormat): Promise<DecodeResult> {
    const source = await readSourceFile(filePath);
    const result = await this.parseWithTimeout(source.buffer, filePath);
    const text = normalizeText(result.text);
    const records = splitParagraphs(text);

    const title = infoString(result.info, "Title");
    const author = infoString(result.info, "Author");

    this.logger.debug(
      { filename: source.filename, pages: result.numpages, paragraphs: records.length },
      "Decoded PDF file"
    );

    return {
      records,
      metadata: {
        filename: source.filename,
        sizeBytes: source.sizeBytes,
        format,
        pageCount: result.numpages,
        ...(title !== undefined && { title }),
        ...(author !== undefined && { author }),
        ...describeText(text),
        paragraphCount: records.length,
      },
    };
  }

  private parseWithTimeout(buffer: Buffer, filePath: string): Promise<PdfParse.Result> {
    // settled guards against the timeout and the parse both resolving
    let settled = false;

    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        if (settled) return;
        settled = true;
        reject(
          new DecodeTimeoutError(`PDF decoding timed out after ${this.timeoutMs}ms`, this.timeoutMs, {
            filePath,
          })
        );
      }, this.timeoutMs);

      pdfParse(buffer)
        .then((result) => {
          clearTimeout(timeoutId);
          if (settled) return;
          settled = true;
          resolve(result);
        })
        .catch((error: unknown) => {
          clearTimeout(timeoutId);
          if (settled) return;
          settled = true;
          const cause = error instanceof Error ? error : new Error(String(error));
          const lowered = cause.message.toLowerCase();
          const reason =
            lowered.includes("password") || lowered.includes("encrypt")
              ? "PDF is password-protected"
              : `Failed to parse PDF: ${cause.message}`;
          reject(new DecodeError(reason, { filePath, cause }));
        });
    });
  }
}
