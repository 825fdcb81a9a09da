/**
 * Format names, aliases and extension detection
 *
 * @module documents/formats
 */

import * as path from "node:path";
import { DOCUMENT_FORMATS, type DocumentFormat } from "./types.js";
import { UnsupportedFormatError } from "./errors.js";

const FORMAT_ALIASES = new Map<string, DocumentFormat>(Object.entries({
  csv: "csv",
  tsv: "tsv",
  tab: "tsv",
  json: "json",
  txt: "txt",
  text: "txt",
  md: "markdown",
  markdown: "markdown",
  pdf: "pdf",
} satisfies Record<string, DocumentFormat>));

const EXTENSION_TO_FORMAT = new Map<string, DocumentFormat>(Object.entries({
  ".csv": "csv",
  ".tsv": "tsv",
  ".tab": "tsv",
  ".json": "json",
  ".txt": "txt",
  ".text": "txt",
  ".md": "markdown",
  ".markdown": "markdown",
  ".pdf": "pdf",
} satisfies Record<string, DocumentFormat>));

/**
 * Type guard for canonical format names
 */
export function isDocumentFormat(value: string): value is DocumentFormat {
  return DOCUMENT_FORMATS.some((format) => format === value);
}

/**
 * Resolve a declared format name, tolerating case, a leading dot and aliases.
 * Returns undefined for anything unrecognized.
 *
 * @example
 * ```typescript
 * resolveDocumentFormat(".MD"); // "markdown"
 * resolveDocumentFormat("xlsx"); // undefined
 * ```
 */
export function resolveDocumentFormat(value: string): DocumentFormat | undefined {
  const normalized = value.trim().toLowerCase().replace(/^\./, "");
  return FORMAT_ALIASES.get(normalized);
}

/**
 * Like {@link resolveDocumentFormat} but throws for unknown names
 *
 * @throws {UnsupportedFormatError}
 */
export function parseDocumentFormat(value: string): DocumentFormat {
  const format = resolveDocumentFormat(value);
  if (format === undefined) {
    throw new UnsupportedFormatError(
      `Unsupported format: "${value}". Supported formats: ${DOCUMENT_FORMATS.join(", ")}`,
      value
    );
  }
  return format;
}

/**
 * Detect a format from a file extension
 *
 * @example
 * ```typescript
 * detectFormat("/data/movies.CSV"); // "csv"
 * detectFormat("/data/notes"); // undefined
 * ```
 */
export function detectFormat(filePath: string): DocumentFormat | undefined {
  const extension = path.extname(filePath).toLowerCase();
  return EXTENSION_TO_FORMAT.get(extension);
}

/**
 * File extensions recognized for a format, e.g. `[".md", ".markdown"]`
 */
export function extensionsFor(format: DocumentFormat): string[] {
  return [...EXTENSION_TO_FORMAT]
    .filter(([, candidate]) => candidate === format)
    .map(([extension]) => extension);
}
