/**
 * @module pipeline/stages/StorageStage
 */

import type { GraphGateway } from "../../graph/types.js";
import { PipelineConfigurationError } from "../errors.js";
import type { PipelineContext } from "../PipelineContext.js";
import { Stage } from "../Stage.js";
import { STAGE_NAMES, type StageResult } from "../types.js";

/** Consecutive slices of at most `size` items */
function batches<T>(items: readonly T[], size: number): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

/**
 * Upsert the final entities, then the final relations, in batches, and read
 * graph statistics afterwards
 *
 * Batches are independent writes: when a later batch fails, earlier ones
 * stay in the graph.
 */
export class StorageStage extends Stage {
  /**
   * @param graph - Gateway the batches are written to
   * @param batchSize - Entities or relations per upsert call
   * @throws {PipelineConfigurationError} when `batchSize` is not a positive integer
   */
  constructor(
    private readonly graph: GraphGateway,
    private readonly batchSize: number
  ) {
    super(STAGE_NAMES.storage);
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new PipelineConfigurationError(`Storage batch size must be a positive integer, got ${batchSize}`);
    }
  }

  /**
   * Write the merged entities before the merged relations, then read stats
   *
   * @returns `skipped` with reason `no_data` when there is nothing to store
   * @throws {GraphError} from the gateway; earlier batches stay written
   */
  async execute(context: PipelineContext): Promise<StageResult> {
    const entities = context.finalEntities();
    const relations = context.finalRelations();
    if (entities.length === 0 && relations.length === 0) {
      return this.skipped("no_data");
    }

    const entityIds: string[] = [];
    for (const batch of batches(entities, this.batchSize)) {
      context.assertActive(this.name);
      entityIds.push(...(await this.graph.upsertEntities(batch)));
    }

    const relationIds: string[] = [];
    for (const batch of batches(relations, this.batchSize)) {
      context.assertActive(this.name);
      relationIds.push(...(await this.graph.upsertRelations(batch)));
    }

    const graphStats = await this.graph.stats();

    context.assertActive(this.name);
    context.storage = {
      entitiesStored: entityIds.length,
      relationsStored: relationIds.length,
      entityIds,
      relationIds,
      graphStats,
    };

    this.logger.info(
      {
        file: context.filename,
        entitiesStored: entityIds.length,
        relationsStored: relationIds.length,
        batchSize: this.batchSize,
      },
      "Graph updated"
    );
    return this.completed({
      entitiesStored: entityIds.length,
      relationsStored: relationIds.length,
      graphStats,
    });
  }
}
