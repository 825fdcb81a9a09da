/**
 * @module pipeline/stages/ValidationStage
 */

import { entityKey, relationKey } from "../../graph/merge.js";
import { ENTITY_TYPES, RELATION_TYPES, type Entity, type Relation } from "../../graph/types.js";
import type { PipelineContext } from "../PipelineContext.js";
import { Stage } from "../Stage.js";
import { STAGE_NAMES, type StageResult, type ValidationIssue, type ValidationReport } from "../types.js";

const entityTypes: ReadonlySet<string> = new Set(ENTITY_TYPES);
const relationTypes: ReadonlySet<string> = new Set(RELATION_TYPES);

/** `Person\u0000tom hanks` as `Person:tom hanks` */
function displayKey(key: string): string {
  return key.split("\u0000").join(":");
}

function confidenceInRange(confidence: number): boolean {
  return Number.isFinite(confidence) && confidence >= 0 && confidence <= 1;
}

/**
 * Check the final entity and relation sets against the data model
 *
 * Only model invariants are checked: non-empty names, types from the closed
 * sets, confidence in [0, 1], unique identities, and relation endpoints that
 * resolve to a final entity of the declared type. Missing endpoint types are
 * warnings.
 *
 * @param entities - Final entity set
 * @param relations - Final relation set
 * @returns Report with `valid` false when any error was found
 */
export function validateGraphData(
  entities: readonly Entity[],
  relations: readonly Relation[]
): ValidationReport {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];
  const seenEntities = new Set<string>();
  const typesByName = new Map<string, Set<string>>();

  for (const entity of entities) {
    const key = displayKey(entityKey(entity));
    const issue = (message: string): void => {
      errors.push({ severity: "error", target: "entity", key, message });
    };

    if (entity.name.trim().length === 0) {
      issue("Entity name is empty");
    }
    if (!entityTypes.has(entity.type)) {
      issue(`Unknown entity type "${entity.type}"`);
    }
    if (!confidenceInRange(entity.confidence)) {
      issue(`Confidence ${entity.confidence} is outside [0, 1]`);
    }
    if (seenEntities.has(key)) {
      issue("Duplicate entity identity");
    }
    seenEntities.add(key);

    const name = entity.name.toLowerCase();
    typesByName.set(name, (typesByName.get(name) ?? new Set<string>()).add(entity.type));
  }

  const seenRelations = new Set<string>();
  for (const relation of relations) {
    const key = displayKey(relationKey(relation));
    const issue = (message: string): void => {
      errors.push({ severity: "error", target: "relation", key, message });
    };

    if (!relationTypes.has(relation.type)) {
      issue(`Unknown relation type "${relation.type}"`);
    }
    if (!confidenceInRange(relation.confidence)) {
      issue(`Confidence ${relation.confidence} is outside [0, 1]`);
    }
    if (seenRelations.has(key)) {
      issue("Duplicate relation identity");
    }
    seenRelations.add(key);

    const endpoints = [
      { role: "Source", name: relation.fromEntity, type: relation.fromEntityType },
      { role: "Target", name: relation.toEntity, type: relation.toEntityType },
    ];
    for (const endpoint of endpoints) {
      const types = typesByName.get(endpoint.name.toLowerCase());
      if (!types) {
        issue(`${endpoint.role} entity "${endpoint.name}" does not exist`);
      } else if (endpoint.type === undefined) {
        warnings.push({
          severity: "warning",
          target: "relation",
          key,
          message: `${endpoint.role} entity type is not declared`,
        });
      } else if (!types.has(endpoint.type)) {
        issue(`${endpoint.role} entity "${endpoint.name}" is not a ${endpoint.type}`);
      }
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    checkedEntities: entities.length,
    checkedRelations: relations.length,
  };
}

/**
 * Record a validation report. In strict mode any error fails the stage.
 */
export class ValidationStage extends Stage {
  /**
   * @param strict - Fail the stage when the report has errors; otherwise the
   *   errors are recorded and the run continues
   */
  constructor(private readonly strict: boolean = false) {
    super(STAGE_NAMES.validation);
  }

  async execute(context: PipelineContext): Promise<StageResult> {
    const report = validateGraphData(context.finalEntities(), context.finalRelations());

    context.assertActive(this.name);
    context.validationReport = report;

    const output = {
      valid: report.valid,
      errorCount: report.errors.length,
      warningCount: report.warnings.length,
      checkedEntities: report.checkedEntities,
      checkedRelations: report.checkedRelations,
    };

    if (!report.valid) {
      this.logger.warn(
        { file: context.filename, errors: report.errors.length, first: report.errors[0], strict: this.strict },
        "Validation found errors"
      );
      if (this.strict) {
        return {
          ...this.failed(`Validation failed with ${report.errors.length} errors`, { strict: true }),
          outputData: output,
        };
      }
    }
    return this.completed(output, { strict: this.strict });
  }
}
