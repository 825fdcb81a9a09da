export { ParsingStage } from "./ParsingStage.js";
export { ChunkingStage } from "./ChunkingStage.js";
export { EmbeddingStage } from "./EmbeddingStage.js";
export { NerStage } from "./NerStage.js";
export { ExtractionStage, resolveRelations, type RelationResolution } from "./ExtractionStage.js";
export { TransformationStage } from "./TransformationStage.js";
export { EnrichmentStage } from "./EnrichmentStage.js";
export { ValidationStage, validateGraphData } from "./ValidationStage.js";
export { StorageStage } from "./StorageStage.js";
