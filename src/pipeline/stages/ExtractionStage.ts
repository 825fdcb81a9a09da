/**
 * @module pipeline/stages/ExtractionStage
 */

import type { DecodedMetadata } from "../../documents/types.js";
import type { ExtractionAgent, ExtractionUnit } from "../../extraction/types.js";
import { mergeEntities, mergeRelations } from "../../graph/merge.js";
import { normalizeEntities, normalizeRelations } from "../../graph/normalize.js";
import type { Entity, Relation } from "../../graph/types.js";
import type { PipelineContext } from "../PipelineContext.js";
import { Stage } from "../Stage.js";
import { STAGE_NAMES, type StageResult } from "../types.js";

/**
 * Outcome of {@link resolveRelations}
 */
export interface RelationResolution {
  /** Relations whose endpoints both named a known entity */
  resolved: Relation[];
  dropped: Relation[];
}

/**
 * Point each relation at a known entity
 *
 * An endpoint resolves by lowercase name alone. A declared endpoint type only
 * picks between several entities sharing that name, falling back to the first
 * one seen. Resolved relations take the entity's spelling and type, whatever
 * type the relation declared; relations naming an unknown entity are returned
 * as dropped.
 *
 * @param relations - Normalized, merged relations
 * @param entities - Final entities of the run
 * @returns Resolved relations and the ones dropped, each in input order
 */
export function resolveRelations(
  relations: readonly Relation[],
  entities: readonly Entity[]
): RelationResolution {
  const byName = new Map<string, Entity[]>();
  for (const entity of entities) {
    const key = entity.name.toLowerCase();
    byName.set(key, [...(byName.get(key) ?? []), entity]);
  }

  const find = (name: string, type: Entity["type"] | undefined): Entity | undefined => {
    const candidates = byName.get(name.toLowerCase()) ?? [];
    return candidates.find((entity) => entity.type === type) ?? candidates[0];
  };

  const result: RelationResolution = { resolved: [], dropped: [] };
  for (const relation of relations) {
    const from = find(relation.fromEntity, relation.fromEntityType);
    const to = find(relation.toEntity, relation.toEntityType);
    if (!from || !to) {
      result.dropped.push(relation);
      continue;
    }
    result.resolved.push({
      ...relation,
      fromEntity: from.name,
      toEntity: to.name,
      fromEntityType: from.type,
      toEntityType: to.type,
    });
  }
  return result;
}

function countByType(items: ReadonlyArray<{ type: string }>): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const item of items) {
    counts[item.type] = (counts[item.type] ?? 0) + 1;
  }
  return counts;
}

/**
 * Ask the extraction agent for candidates, normalize them into typed values
 * and deduplicate
 *
 * Reads chunks when the pipeline produced them, otherwise the decoded
 * records. Relations whose endpoints are not among the extracted entities
 * are dropped with a warning.
 */
export class ExtractionStage extends Stage {
  /**
   * @param agent - Extraction agent; without one the stage skips with reason `no_agent`
   * @param batchSize - Texts sent to the agent per call
   */
  constructor(
    private readonly agent: ExtractionAgent | undefined,
    private readonly batchSize: number
  ) {
    super(STAGE_NAMES.extraction);
  }

  /**
   * Extract entities first, then relations among the merged entities
   *
   * @returns `skipped` without an agent or input units; otherwise counts of
   *   raw, rejected, merged and dropped candidates
   * @throws {ExtractionError} when the agent fails
   */
  async execute(context: PipelineContext): Promise<StageResult> {
    const agent = this.agent;
    if (!agent) {
      return this.skipped("no_agent");
    }

    const units: readonly ExtractionUnit[] = context.chunks.length > 0 ? context.chunks : context.records;
    if (units.length === 0) {
      return this.skipped("no_records");
    }
    const metadata: DecodedMetadata = context.metadata ?? {
      filename: context.filename,
      sizeBytes: 0,
      format: context.format,
    };
    const options = { signal: context.signal };

    const rawEntities = await agent.extractEntities(units, metadata, this.batchSize, options);
    const normalizedEntities = normalizeEntities(rawEntities, context.filename);
    this.warnRejected("entity", normalizedEntities.rejected);
    const entities = mergeEntities(normalizedEntities.items);

    const rawRelations = await agent.extractRelations(units, entities, metadata, this.batchSize, options);
    const normalizedRelations = normalizeRelations(rawRelations, context.filename);
    this.warnRejected("relation", normalizedRelations.rejected);
    const { resolved, dropped } = resolveRelations(mergeRelations(normalizedRelations.items), entities);

    if (dropped.length > 0) {
      this.logger.warn(
        {
          file: context.filename,
          dropped: dropped.length,
          examples: dropped.slice(0, 3).map((relation) => `${relation.fromEntity} -${relation.type}-> ${relation.toEntity}`),
        },
        "Dropped relations referencing unknown entities"
      );
    }

    context.assertActive(this.name);
    context.entities = entities;
    context.relations = resolved;

    this.logger.info(
      { file: context.filename, entities: entities.length, relations: resolved.length },
      "Extraction finished"
    );
    return this.completed({
      unitKind: context.chunks.length > 0 ? "chunk" : "record",
      unitCount: units.length,
      rawEntityCount: rawEntities.length,
      rawRelationCount: rawRelations.length,
      entityCount: entities.length,
      relationCount: resolved.length,
      rejectedEntities: normalizedEntities.rejected.length,
      rejectedRelations: normalizedRelations.rejected.length,
      droppedRelations: dropped.length,
      entitiesByType: countByType(entities),
      relationsByType: countByType(resolved),
    });
  }

  private warnRejected(what: "entity" | "relation", rejected: ReadonlyArray<{ index: number; reason: string }>): void {
    if (rejected.length === 0) {
      return;
    }
    this.logger.warn(
      { what, rejected: rejected.length, reasons: rejected.slice(0, 5) },
      "Dropped malformed extraction candidates"
    );
  }
}
