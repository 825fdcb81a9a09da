/**
 * Chunking types
 *
 * @module ingestion/types
 */

import type { SourceRecord } from "../documents/types.js";

/**
 * A unit of text sized for embedding, NER and LLM extraction
 */
export interface TextChunk {
  /** `<filename>:<index>` */
  id: string;
  /** 0-based position among the document's chunks */
  index: number;
  content: string;
  /** Kind of the record the chunk was cut from */
  sourceKind: SourceRecord["kind"];
  /** Index of that record */
  sourceIndex: number;
  /** 1-based line span within the record's text, for text records */
  startLine?: number;
  endLine?: number;
  charCount: number;
  /** `ceil(chars / 4)` */
  tokenEstimate: number;
  /** SHA-256 of `content` */
  contentHash: string;
}

export interface ChunkerConfig {
  /**
   * Target maximum characters per chunk
   * @default 1000
   */
  chunkSize?: number;

  /**
   * Characters of trailing context carried into the next chunk, taken as
   * whole lines
   * @default 200
   */
  chunkOverlap?: number;
}
