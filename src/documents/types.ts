/**
 * Document and decoder types
 *
 * @module documents/types
 */

/**
 * Input formats the ingestion pipeline accepts
 */
export const DOCUMENT_FORMATS = ["csv", "tsv", "json", "txt", "markdown", "pdf"] as const;

export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

/**
 * One row of a tabular source. Values are kept as the raw cell strings;
 * inferred column types live in the decoder metadata.
 */
export interface RowRecord {
  kind: "row";
  /** 0-based position among data rows (header excluded) */
  index: number;
  values: Record<string, string>;
}

/**
 * One structured item of a semi-structured source (a JSON array element)
 */
export interface ObjectRecord {
  kind: "object";
  index: number;
  value: unknown;
}

/**
 * A contiguous block of free text (a paragraph or section)
 */
export interface TextRecord {
  kind: "text";
  index: number;
  content: string;
  /** 1-based first line of the block in the source text */
  startLine: number;
  /** 1-based last line, inclusive */
  endLine: number;
}

export type SourceRecord = RowRecord | ObjectRecord | TextRecord;

/**
 * Metadata every decoder reports, plus format-specific keys
 */
export interface DecodedMetadata {
  filename: string;
  sizeBytes: number;
  format: DocumentFormat;
  [key: string]: unknown;
}

export interface DecodeResult {
  /** May be empty, never null */
  records: SourceRecord[];
  metadata: DecodedMetadata;
}

/**
 * Turns a file on disk into records plus metadata
 */
export interface Decoder {
  /** Formats this decoder handles */
  readonly formats: readonly DocumentFormat[];

  /**
   * @throws {DecodeError} when the content is malformed
   * @throws {FileAccessError} when the file cannot be read
   */
  decode(filePath: string, format: DocumentFormat): Promise<DecodeResult>;
}

/**
 * Ingestion job status
 *
 * Ordered for the monotonicity guard: pending < parsing <
 * extracting_entities < extracting_relations < validating < storing <
 * completed | failed.
 */
export type DocumentStatus =
  | "pending"
  | "parsing"
  | "extracting_entities"
  | "extracting_relations"
  | "validating"
  | "storing"
  | "completed"
  | "failed";

/**
 * Plain snapshot of a document, safe to serialize
 */
export interface DocumentSnapshot {
  id: string;
  filename: string;
  format: DocumentFormat;
  sizeBytes: number;
  status: DocumentStatus;
  progress: number;
  entitiesExtracted: number;
  relationsExtracted: number;
  error?: string;
  uploadedAt: string;
  processedAt?: string;
  metadata: Record<string, unknown>;
}
