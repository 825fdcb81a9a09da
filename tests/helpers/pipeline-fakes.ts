/**
 * In-process collaborators for pipeline, stage and orchestrator tests
 *
 * @module tests/helpers/pipeline-fakes
 */

import type { DecodedMetadata } from "../../src/documents/types.js";
import type {
  ChatClient,
  ExtractionAgent,
  ExtractionCallOptions,
  ExtractionUnit,
  NerMention,
  NerService,
} from "../../src/extraction/types.js";
import { entityKey } from "../../src/graph/merge.js";
import type {
  Entity,
  GraphGateway,
  GraphStats,
  GraphVisualization,
  Relation,
} from "../../src/graph/types.js";
import { PipelineContext } from "../../src/pipeline/PipelineContext.js";
import { Stage } from "../../src/pipeline/Stage.js";
import type { StageResult } from "../../src/pipeline/types.js";
import type { EmbeddingProvider } from "../../src/providers/types.js";
import type { EntityIndex } from "../../src/retrieval/types.js";

/**
 * Graph store held in maps. Nodes merge on `(type, name)` like the Cypher
 * MERGE the real gateway issues; relations need both endpoints.
 */
export class FakeGraphGateway implements GraphGateway {
  readonly nodes = new Map<string, { id: string; entity: Entity }>();
  readonly edges = new Map<string, { id: string; relation: Relation }>();
  readonly entityBatches: Entity[][] = [];
  readonly relationBatches: Relation[][] = [];
  failEntities?: Error;
  failRelations?: Error;
  private nextId = 1;

  async upsertEntities(entities: readonly Entity[]): Promise<string[]> {
    if (this.failEntities) {
      throw this.failEntities;
    }
    this.entityBatches.push([...entities]);
    return entities.map((entity) => {
      const key = `${entity.type}:${entity.name}`;
      const existing = this.nodes.get(key);
      const id = existing?.id ?? `node-${this.nextId++}`;
      this.nodes.set(key, { id, entity });
      return id;
    });
  }

  async upsertRelations(relations: readonly Relation[]): Promise<string[]> {
    if (this.failRelations) {
      throw this.failRelations;
    }
    this.relationBatches.push([...relations]);
    const ids: string[] = [];
    for (const relation of relations) {
      if (!this.hasNode(relation.fromEntity) || !this.hasNode(relation.toEntity)) {
        continue;
      }
      const key = `${relation.type}:${relation.fromEntity}:${relation.toEntity}`;
      const id = this.edges.get(key)?.id ?? `rel-${this.nextId++}`;
      this.edges.set(key, { id, relation });
      ids.push(id);
    }
    return ids;
  }

  async stats(): Promise<GraphStats> {
    const byLabel: Record<string, number> = {};
    for (const { entity } of this.nodes.values()) {
      byLabel[entity.type] = (byLabel[entity.type] ?? 0) + 1;
    }
    const byType: Record<string, number> = {};
    for (const { relation } of this.edges.values()) {
      byType[relation.type] = (byType[relation.type] ?? 0) + 1;
    }
    return {
      totalNodes: this.nodes.size,
      totalRelationships: this.edges.size,
      byLabel,
      byType,
    };
  }

  async visualize(limit: number): Promise<GraphVisualization> {
    const nodes = [...this.nodes.values()].slice(0, limit).map(({ id, entity }) => ({
      id,
      label: entity.type,
      name: entity.name,
      properties: { ...entity.properties },
    }));
    const idByName = new Map(nodes.map((node) => [node.name, node.id]));
    const edges: GraphVisualization["edges"] = [];
    for (const { id, relation } of this.edges.values()) {
      const source = idByName.get(relation.fromEntity);
      const target = idByName.get(relation.toEntity);
      if (source && target) {
        edges.push({ id, type: relation.type, source, target, properties: { ...relation.properties } });
      }
    }
    return { nodes, edges };
  }

  async clear(): Promise<void> {
    this.nodes.clear();
    this.edges.clear();
  }

  private hasNode(name: string): boolean {
    return [...this.nodes.values()].some(({ entity }) => entity.name === name);
  }
}

export interface AgentCall {
  kind: "entities" | "relations";
  unitCount: number;
  batchSize: number;
  metadata: DecodedMetadata;
  entityNames?: string[];
}

/**
 * Extraction agent returning scripted candidates
 */
export class FakeExtractionAgent implements ExtractionAgent {
  readonly calls: AgentCall[] = [];
  entityError?: Error;
  relationError?: Error;

  constructor(
    private readonly entities: unknown[] = [],
    private readonly relations: unknown[] = []
  ) {}

  async extractEntities(
    units: readonly ExtractionUnit[],
    metadata: DecodedMetadata,
    batchSize: number,
    _options?: ExtractionCallOptions
  ): Promise<unknown[]> {
    this.calls.push({ kind: "entities", unitCount: units.length, batchSize, metadata });
    if (this.entityError) {
      throw this.entityError;
    }
    return [...this.entities];
  }

  async extractRelations(
    units: readonly ExtractionUnit[],
    entities: readonly Entity[],
    metadata: DecodedMetadata,
    batchSize: number,
    _options?: ExtractionCallOptions
  ): Promise<unknown[]> {
    this.calls.push({
      kind: "relations",
      unitCount: units.length,
      batchSize,
      metadata,
      entityNames: entities.map((entity) => entity.name),
    });
    if (this.relationError) {
      throw this.relationError;
    }
    return [...this.relations];
  }
}

/**
 * Embedding provider returning `[text length, 0, 0, ...]` vectors
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly providerId = "fake";
  readonly modelId = "fake-embedding";
  readonly requests: string[][] = [];
  error?: Error;
  /** Return this many vectors instead of one per text */
  overrideCount?: number;
  /** Return vectors of this size instead of `dimensions` */
  overrideDimensions?: number;

  constructor(readonly dimensions: number = 4) {}

  async generateEmbedding(text: string): Promise<number[]> {
    const [vector] = await this.generateEmbeddings([text]);
    return vector ?? [];
  }

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    this.requests.push([...texts]);
    if (this.error) {
      throw this.error;
    }
    const size = this.overrideDimensions ?? this.dimensions;
    const count = this.overrideCount ?? texts.length;
    return Array.from({ length: count }, (_, index) => {
      const vector = new Array<number>(size).fill(0);
      vector[0] = (texts[index] ?? "").length;
      return vector;
    });
  }

  async healthCheck(): Promise<boolean> {
    return this.error === undefined;
  }
}

/**
 * NER service that tags every occurrence of the given words
 */
export class FakeNerService implements NerService {
  readonly texts: string[] = [];
  error?: Error;

  constructor(private readonly vocabulary: Record<string, string> = {}) {}

  async extractEntities(text: string): Promise<NerMention[]> {
    this.texts.push(text);
    if (this.error) {
      throw this.error;
    }
    const mentions: NerMention[] = [];
    for (const [word, label] of Object.entries(this.vocabulary)) {
      let start = text.indexOf(word);
      while (start !== -1) {
        mentions.push({ text: word, label, start, end: start + word.length, confidence: 0.9 });
        start = text.indexOf(word, start + word.length);
      }
    }
    return mentions.sort((a, b) => a.start - b.start);
  }
}

/**
 * Chat client answering from a queue of scripted replies
 */
export class FakeChatClient implements ChatClient {
  readonly model = "fake-chat";
  readonly prompts: string[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error("FakeChatClient has no reply left");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export class FakeEntityIndex implements EntityIndex {
  readonly indexed: Entity[][] = [];
  error?: Error;

  async indexEntities(entities: readonly Entity[]): Promise<number> {
    if (this.error) {
      throw this.error;
    }
    this.indexed.push([...entities]);
    return entities.length;
  }
}

/**
 * Stage with scripted behavior that records the order it ran in
 */
export class ScriptedStage extends Stage {
  runs = 0;

  constructor(
    name: string,
    private readonly behavior:
      | "complete"
      | "skip"
      | "fail"
      | "throw"
      | ((context: PipelineContext) => Promise<StageResult>) = "complete",
    private readonly log?: string[]
  ) {
    super(name);
  }

  async execute(context: PipelineContext): Promise<StageResult> {
    this.runs++;
    this.log?.push(this.name);
    const behavior = this.behavior;
    if (typeof behavior === "function") {
      return behavior(context);
    }
    switch (behavior) {
      case "complete":
        return this.completed({ ran: true });
      case "skip":
        return this.skipped("scripted");
      case "fail":
        return this.failed(`${this.name} scripted failure`);
      case "throw":
        throw new Error(`${this.name} exploded`);
    }
  }
}

export function makeEntity(type: Entity["type"], name: string, overrides: Partial<Entity> = {}): Entity {
  return { type, name, properties: {}, confidence: 0.9, ...overrides };
}

export function makeRelation(
  type: Relation["type"],
  fromEntity: string,
  toEntity: string,
  overrides: Partial<Relation> = {}
): Relation {
  return { type, fromEntity, toEntity, properties: {}, confidence: 0.8, ...overrides };
}

export function makeContext(overrides: Partial<ConstructorParameters<typeof PipelineContext>[0]> = {}): PipelineContext {
  return new PipelineContext({ filePath: "/data/movies.csv", format: "csv", ...overrides });
}

/**
 * Distinct-key helper for asserting merge output
 */
export function keysOf(entities: readonly Entity[]): string[] {
  return entities.map((entity) => entityKey(entity).replace("\u0000", ":"));
}
