/**
 * Documents: formats, decoders and the ingestion job lifecycle
 *
 * @module documents
 */

export * from "./types.js";
export * from "./errors.js";
export {
  parseDocumentFormat,
  resolveDocumentFormat,
  detectFormat,
  isDocumentFormat,
  extensionsFor,
} from "./formats.js";
export {
  IngestionDocument,
  statusRank,
  isTerminalStatus,
  type IngestionDocumentInit,
} from "./IngestionDocument.js";
export { InMemoryDocumentStore, type DocumentStore } from "./DocumentStore.js";
export { DecoderRegistry } from "./decoders/DecoderRegistry.js";
export { CsvDecoder, detectDelimiter, inferColumnType, type ColumnType } from "./decoders/CsvDecoder.js";
export { JsonDecoder, selectRecords } from "./decoders/JsonDecoder.js";
export {
  PlainTextDecoder,
  splitParagraphs,
  extractHeadings,
  type MarkdownHeading,
} from "./decoders/PlainTextDecoder.js";
export { PdfDecoder, type PdfDecoderConfig } from "./decoders/PdfDecoder.js";
export { statSourceFile } from "./decoders/source-file.js";
