export { RecordChunker, renderRow, estimateTokens } from "./record-chunker.js";
export { ChunkerConfigError } from "./errors.js";
export type { TextChunk, ChunkerConfig } from "./types.js";
