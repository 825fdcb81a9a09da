/**
 * IngestionOrchestrator - runs one file through the pipeline for its format
 *
 * @module services/ingestion-orchestrator
 */

import type { Logger } from "pino";
import type { DocumentStore } from "../documents/DocumentStore.js";
import { IngestionDocument } from "../documents/IngestionDocument.js";
import { statSourceFile } from "../documents/decoders/source-file.js";
import { parseDocumentFormat } from "../documents/formats.js";
import type { DocumentFormat } from "../documents/types.js";
import type { Entity, GraphStats, GraphVisualization, Relation } from "../graph/types.js";
import { getComponentLogger } from "../logging/index.js";
import type { Pipeline } from "../pipeline/Pipeline.js";
import { PipelineContext } from "../pipeline/PipelineContext.js";
import type { PipelineFactory } from "../pipeline/PipelineFactory.js";
import type { PipelineRunSummary } from "../pipeline/types.js";
import type { EntityIndex } from "../retrieval/types.js";
import type {
  IngestionOrchestratorOptions,
  IngestionSummary,
  ProcessOptions,
} from "./ingestion-types.js";

/**
 * Count items per `type`, e.g. `{ Person: 2, Movie: 1 }`
 */
function countByType(items: ReadonlyArray<Entity | Relation>): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    counts[item.type] = (counts[item.type] ?? 0) + 1;
  }
  return counts;
}

/**
 * Top-level entry point for ingestion
 *
 * Checks the declared format and the file before any document exists,
 * then creates a document, runs the pipeline and summarizes the context.
 * Stage failures come back as a `failed` summary rather than an exception.
 * After a successful run the final entities are indexed on a best-effort
 * basis: an indexing failure is reported but leaves the document completed.
 *
 * @example
 * ```typescript
 * const orchestrator = new IngestionOrchestrator({
 *   factory,
 *   documents: new InMemoryDocumentStore(),
 *   entityIndex,
 *   timeoutMs: 300_000,
 * });
 *
 * const summary = await orchestrator.process("./data/movies.csv", "csv");
 * console.log(summary.status, summary.extraction.entitiesByType);
 * ```
 */
export class IngestionOrchestrator {
  private readonly factory: PipelineFactory;
  private readonly documents: DocumentStore;
  private readonly entityIndex?: EntityIndex;
  private readonly timeoutMs?: number;
  private readonly indexingEnabled: boolean;

  /** One pipeline per format, built on first use */
  private readonly pipelines = new Map<DocumentFormat, Pipeline>();

  private _logger: Logger | null = null;

  /**
   * @param options - Factory, document store and the optional entity index
   *   and default deadline
   */
  constructor(options: IngestionOrchestratorOptions) {
    this.factory = options.factory;
    this.documents = options.documents;
    this.entityIndex = options.entityIndex;
    this.timeoutMs = options.timeoutMs;
    this.indexingEnabled = options.indexingEnabled ?? true;
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("services:orchestrator");
    }
    return this._logger;
  }

  /**
   * Cached pipeline for a format
   *
   * The first call per format builds the pipeline through the factory; later
   * calls reuse it, including its enabled and disabled stages.
   *
   * @param format - Resolved document format
   * @returns Pipeline shared by every document of that format
   */
  pipelineFor(format: DocumentFormat): Pipeline {
    let pipeline = this.pipelines.get(format);
    if (!pipeline) {
      pipeline = this.factory.forFormat(format);
      this.pipelines.set(format, pipeline);
    }
    return pipeline;
  }

  /**
   * Ingest one file
   *
   * The document is saved to the store before the pipeline starts, so it can
   * be polled by id while the run is in progress. Progress events carry the
   * document id. A run that fails, or exceeds its deadline, still resolves
   * with a summary whose status is `failed`.
   *
   * @param filePath - Path of the file to ingest
   * @param declaredFormat - Format name or alias, e.g. "csv" or "md"
   * @param options - Pipeline override, deadline, cancellation and progress callback
   * @returns Summary of the document, extraction counts, storage and indexing
   * @throws {UnsupportedFormatError} for an unknown declared format, before any document exists
   * @throws {FileAccessError} when the file is missing or unreadable, before any document exists
   */
  async process(
    filePath: string,
    declaredFormat: string,
    options: ProcessOptions = {}
  ): Promise<IngestionSummary> {
    const format = parseDocumentFormat(declaredFormat);
    const file = await statSourceFile(filePath);

    const document = new IngestionDocument({
      filename: file.filename,
      format,
      sizeBytes: file.sizeBytes,
      metadata: { filePath },
    });
    this.documents.save(document);

    const pipeline = options.pipeline ? this.factory.create(options.pipeline) : this.pipelineFor(format);
    const context = new PipelineContext({ filePath, filename: file.filename, format, document });

    this.logger.info(
      { documentId: document.id, file: file.filename, format, pipeline: pipeline.name, sizeBytes: file.sizeBytes },
      "Ingestion started"
    );

    const onProgress = options.onProgress;
    const run = await pipeline.execute(context, {
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
      onProgress: onProgress ? (event) => onProgress({ ...event, documentId: document.id }) : undefined,
    });

    const indexing = run.success
      ? await this.indexEntities(document.id, context.finalEntities(), options.signal)
      : { attempted: false, indexed: 0 };

    const summary = this.summarize(document, context, run, indexing);
    this.logger.info(
      {
        documentId: document.id,
        status: summary.status,
        entities: summary.extraction.entities,
        relations: summary.extraction.relations,
        durationMs: run.durationMs,
        ...(run.failedStage !== undefined && { failedStage: run.failedStage }),
      },
      "Ingestion finished"
    );
    return summary;
  }

  /**
   * Look up a document created by {@link process}
   *
   * @param id - Document id from a summary or progress event
   */
  getDocument(id: string): IngestionDocument | undefined {
    return this.documents.get(id);
  }

  listDocuments(): IngestionDocument[] {
    return this.documents.list();
  }

  /**
   * Drop a document from the store
   *
   * @param id - Document id
   * @returns false if no such document was stored
   */
  deleteDocument(id: string): boolean {
    return this.documents.delete(id);
  }

  /** Node and relationship counts of the whole graph */
  graphStats(): Promise<GraphStats> {
    return this.factory.graph.stats();
  }

  /**
   * Sample of the graph for display
   *
   * @param limit - Maximum number of relationships to return
   */
  visualize(limit: number = 100): Promise<GraphVisualization> {
    return this.factory.graph.visualize(limit);
  }

  /**
   * Delete every node and relationship from the graph
   */
  clearGraph(): Promise<void> {
    return this.factory.graph.clear();
  }

  /**
   * Index the final entities; failures are reported, never thrown
   */
  private async indexEntities(
    documentId: string,
    entities: readonly Entity[],
    signal: AbortSignal | undefined
  ): Promise<IngestionSummary["indexing"]> {
    if (!this.entityIndex || !this.indexingEnabled || entities.length === 0) {
      return { attempted: false, indexed: 0 };
    }
    try {
      const indexed = await this.entityIndex.indexEntities(entities, { signal });
      return { attempted: true, indexed };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        { documentId, entities: entities.length, err: error },
        "Entity indexing failed; ingestion result unchanged"
      );
      return { attempted: true, indexed: 0, error: message };
    }
  }

  private summarize(
    document: IngestionDocument,
    context: PipelineContext,
    run: PipelineRunSummary,
    indexing: IngestionSummary["indexing"]
  ): IngestionSummary {
    const entities = context.finalEntities();
    const relations = context.finalRelations();
    const storage = context.storage;

    return {
      status: run.success ? "completed" : "failed",
      document: document.toJSON(),
      extraction: {
        entities: entities.length,
        relations: relations.length,
        entitiesByType: countByType(entities),
        relationsByType: countByType(relations),
        mentions: context.mentions.length,
        chunks: context.chunks.length,
      },
      storage: storage
        ? {
            entitiesStored: storage.entitiesStored,
            relationsStored: storage.relationsStored,
            entityIds: [...storage.entityIds],
            relationIds: [...storage.relationIds],
          }
        : null,
      graphStats: storage?.graphStats ?? null,
      validation: context.validationReport,
      pipeline: {
        name: run.pipeline,
        durationMs: run.durationMs,
        timedOut: run.timedOut,
        failedStage: run.failedStage ?? null,
        stages: context.stageResults.map((result) => ({
          name: result.stageName,
          status: result.status,
          durationMs: result.durationMs,
          ...(result.error !== undefined && { error: result.error }),
        })),
        errors: [...context.errors],
      },
      indexing,
    };
  }
}
