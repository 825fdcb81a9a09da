/**
 * Pipeline orchestration core
 *
 * @module pipeline
 */

export * from "./types.js";
export {
  CollaboratorError,
  PipelineTimeoutError,
  PipelineConfigurationError,
  isCollaboratorError,
  type CollaboratorName,
} from "./errors.js";
export { PipelineContext, type PipelineContextInit, type ChunkMention } from "./PipelineContext.js";
export { Stage, NoOpStage } from "./Stage.js";
export { Pipeline, progressBefore } from "./Pipeline.js";
export {
  PipelineFactory,
  pipelineKindForFormat,
  DEFAULT_FACTORY_DEFAULTS,
  type PipelineDependencies,
  type FactoryDefaults,
  type CustomPipelineOptions,
} from "./PipelineFactory.js";
export * from "./stages/index.js";
