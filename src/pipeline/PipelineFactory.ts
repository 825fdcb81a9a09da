/**
 * Pre-configured pipelines and format-based selection
 *
 * @module pipeline/PipelineFactory
 */

import type pino from "pino";
import type { DecoderRegistry } from "../documents/decoders/DecoderRegistry.js";
import { resolveDocumentFormat } from "../documents/formats.js";
import type { DocumentFormat } from "../documents/types.js";
import type { ExtractionAgent, NerService } from "../extraction/types.js";
import type { GraphGateway } from "../graph/types.js";
import { getComponentLogger } from "../logging/index.js";
import type { EmbeddingProvider } from "../providers/types.js";
import { Pipeline } from "./Pipeline.js";
import type { Stage } from "./Stage.js";
import {
  ChunkingStage,
  EmbeddingStage,
  EnrichmentStage,
  ExtractionStage,
  NerStage,
  ParsingStage,
  StorageStage,
  TransformationStage,
  ValidationStage,
} from "./stages/index.js";
import type { PipelineKind } from "./types.js";

/**
 * Collaborators the stages call. Optional ones make their stages skip.
 */
export interface PipelineDependencies {
  /** Decoders the Parsing stage picks from by format */
  decoders: DecoderRegistry;

  /** Graph store written by the Storage stage */
  graph: GraphGateway;

  /**
   * Agent the Extraction stage calls in batches
   *
   * Without one, extraction is skipped and only records that already carry
   * entities (structured JSON) reach the graph.
   */
  extractionAgent?: ExtractionAgent;

  /** Embeds chunks; Embedding skips when absent */
  embeddingProvider?: EmbeddingProvider;

  /** Named-entity recognizer; NER skips when absent */
  nerService?: NerService;
}

/**
 * Sizes and flags applied to every pipeline the factory builds
 */
export interface FactoryDefaults {
  /**
   * Maximum characters per text chunk
   * @default 1000
   */
  chunkSize: number;

  /**
   * Characters shared by consecutive chunks
   * @default 200
   */
  chunkOverlap: number;
  /** Extraction and storage batch size for the full pipelines */
  extractionBatchSize: number;
  /** Batch size of the minimal fast path */
  minimalBatchSize: number;
  /** Fail the run on invalid entities instead of dropping them */
  strictValidation: boolean;
}

export const DEFAULT_FACTORY_DEFAULTS: FactoryDefaults = {
  chunkSize: 1000,
  chunkOverlap: 200,
  extractionBatchSize: 50,
  minimalBatchSize: 100,
  strictValidation: false,
};

/**
 * Toggles for {@link PipelineFactory.createCustom}. Parsing, Extraction and
 * Storage are always present; Parsing is first and Storage last.
 */
export interface CustomPipelineOptions {
  /** Pipeline name; defaults to "custom" */
  name?: string;
  chunking?: boolean;
  embedding?: boolean;
  ner?: boolean;
  transformation?: boolean;
  enrichment?: boolean;
  validation?: boolean;
  /** Extraction and storage batch size; defaults to {@link FactoryDefaults.extractionBatchSize} */
  batchSize?: number;
  strictValidation?: boolean;
}

const FORMAT_PIPELINES: Readonly<Record<DocumentFormat, PipelineKind>> = {
  csv: "tabular",
  tsv: "tabular",
  json: "default",
  txt: "free-text",
  markdown: "free-text",
  pdf: "free-text",
};

/**
 * Pipeline kind for a format name. Total: unknown names map to `default`.
 *
 * @param format - Format name or alias, case-insensitive
 * @returns Kind of pipeline suited to the format
 *
 * @example
 * ```typescript
 * pipelineKindForFormat("CSV");  // "tabular"
 * pipelineKindForFormat("md");   // "free-text"
 * pipelineKindForFormat("xlsx"); // "default"
 * ```
 */
export function pipelineKindForFormat(format: string): PipelineKind {
  const resolved = resolveDocumentFormat(format);
  return resolved === undefined ? "default" : FORMAT_PIPELINES[resolved];
}

/**
 * Builds pipelines with fresh stage instances on every call
 *
 * @example
 * ```typescript
 * const factory = new PipelineFactory({ decoders: DecoderRegistry.withDefaults(), graph, extractionAgent });
 * const pipeline = factory.forFormat("csv");
 * pipeline.getStageNames(); // ["Parsing", "Extraction", "Transformation", "Validation", "Storage"]
 * ```
 */
export class PipelineFactory {
  readonly defaults: FactoryDefaults;
  private _logger: pino.Logger | null = null;

  /**
   * @param deps - Collaborators handed to the stages of each pipeline built
   * @param defaults - Overrides merged over {@link DEFAULT_FACTORY_DEFAULTS}
   */
  constructor(
    private readonly deps: PipelineDependencies,
    defaults: Partial<FactoryDefaults> = {}
  ) {
    this.defaults = { ...DEFAULT_FACTORY_DEFAULTS, ...defaults };
  }

  /** Gateway the Storage stages write to */
  get graph(): GraphGateway {
    return this.deps.graph;
  }

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("pipeline:factory");
    }
    return this._logger;
  }

  /**
   * Parsing → Chunking → Embedding → NER → Extraction → Transformation →
   * Enrichment → Validation → Storage
   *
   * @returns Nine-stage pipeline named "default"
   */
  createDefault(): Pipeline {
    return this.build("default", this.fullStages());
  }

  /** Same stages as {@link createDefault} */
  createFreeText(): Pipeline {
    return this.build("free-text", this.fullStages());
  }

  /**
   * Parsing → Extraction → Transformation → Validation → Storage
   */
  createTabular(): Pipeline {
    const { extractionBatchSize, strictValidation } = this.defaults;
    return this.build("tabular", [
      this.parsing(),
      new ExtractionStage(this.deps.extractionAgent, extractionBatchSize),
      new TransformationStage(),
      new ValidationStage(strictValidation),
      new StorageStage(this.deps.graph, extractionBatchSize),
    ]);
  }

  /**
   * Parsing → Extraction → Storage, with the larger batch size
   *
   * No validation runs; whatever extraction returns is merged and stored.
   */
  createMinimal(): Pipeline {
    const { minimalBatchSize } = this.defaults;
    return this.build("minimal", [
      this.parsing(),
      new ExtractionStage(this.deps.extractionAgent, minimalBatchSize),
      new StorageStage(this.deps.graph, minimalBatchSize),
    ]);
  }

  /**
   * Assemble a pipeline from optional stages
   *
   * Optional stages keep the order they have in the default pipeline
   * regardless of the order the toggles are given in.
   *
   * @param options - Stage toggles and overrides
   * @returns Pipeline with Parsing first, Extraction in the middle and Storage last
   *
   * @example
   * ```typescript
   * factory.createCustom({ name: "embed-only", embedding: true }).getStageNames();
   * // ["Parsing", "Embedding", "Extraction", "Storage"]
   * ```
   */
  createCustom(options: CustomPipelineOptions = {}): Pipeline {
    const batchSize = options.batchSize ?? this.defaults.extractionBatchSize;
    const strict = options.strictValidation ?? this.defaults.strictValidation;

    const stages: Stage[] = [this.parsing()];
    if (options.chunking) {
      stages.push(this.chunking());
    }
    if (options.embedding) {
      stages.push(new EmbeddingStage(this.deps.embeddingProvider));
    }
    if (options.ner) {
      stages.push(new NerStage(this.deps.nerService));
    }
    stages.push(new ExtractionStage(this.deps.extractionAgent, batchSize));
    if (options.transformation) {
      stages.push(new TransformationStage());
    }
    if (options.enrichment) {
      stages.push(new EnrichmentStage());
    }
    if (options.validation) {
      stages.push(new ValidationStage(strict));
    }
    stages.push(new StorageStage(this.deps.graph, batchSize));

    return this.build(options.name ?? "custom", stages);
  }

  /**
   * Build a pre-configured pipeline by kind
   *
   * @param kind - One of "default", "free-text", "tabular" or "minimal"
   */
  create(kind: PipelineKind): Pipeline {
    switch (kind) {
      case "default":
        return this.createDefault();
      case "free-text":
        return this.createFreeText();
      case "tabular":
        return this.createTabular();
      case "minimal":
        return this.createMinimal();
    }
  }

  /**
   * Pipeline for a declared format; never fails for an unknown format
   *
   * @param format - Format name or alias such as "csv" or "md"
   * @returns Pipeline chosen by {@link pipelineKindForFormat}
   */
  forFormat(format: string): Pipeline {
    return this.create(pipelineKindForFormat(format));
  }

  private fullStages(): Stage[] {
    const { extractionBatchSize, strictValidation } = this.defaults;
    return [
      this.parsing(),
      this.chunking(),
      new EmbeddingStage(this.deps.embeddingProvider),
      new NerStage(this.deps.nerService),
      new ExtractionStage(this.deps.extractionAgent, extractionBatchSize),
      new TransformationStage(),
      new EnrichmentStage(),
      new ValidationStage(strictValidation),
      new StorageStage(this.deps.graph, extractionBatchSize),
    ];
  }

  private parsing(): ParsingStage {
    return new ParsingStage(this.deps.decoders);
  }

  private chunking(): ChunkingStage {
    return new ChunkingStage({
      chunkSize: this.defaults.chunkSize,
      chunkOverlap: this.defaults.chunkOverlap,
    });
  }

  private build(name: string, stages: Stage[]): Pipeline {
    const pipeline = new Pipeline(name, stages);
    this.logger.debug({ pipeline: name, stages: pipeline.getStageNames() }, "Pipeline built");
    return pipeline;
  }
}
