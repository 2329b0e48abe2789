import { z } from "zod";

import { describeError, NotFoundError, OrchestratorError } from "../errors.js";
import { KeyedMutex } from "../infra/keyedMutex.js";
import { applyMapChanges } from "../infra/mapChanges.js";
import { JsonSnapshotFile } from "../infra/snapshotFile.js";
import type { StructuredLogger } from "../logger.js";
import { ERROR_CODES } from "../types.js";

export interface Entity {
  readonly name: string;
  readonly entityType: string;
  readonly observations: readonly string[];
}

export interface Relation {
  readonly from: string;
  readonly to: string;
  readonly relationType: string;
}

export interface EntityInput {
  name: string;
  entityType: string;
  observations?: readonly string[];
}

export interface ObservationInput {
  entityName: string;
  contents: readonly string[];
}

export interface ObservationDeletion {
  entityName: string;
  observations: readonly string[];
}

export interface ObservationAddition {
  entityName: string;
  addedObservations: string[];
}

/** Point-in-time view of the graph. Later writes are not reflected. */
export interface GraphSnapshot {
  readonly entities: readonly Entity[];
  readonly relations: readonly Relation[];
}

/** Raised when a relation references entities that do not exist. */
export class DanglingReferenceError extends OrchestratorError {
  constructor(readonly missing: readonly string[]) {
    super(
      ERROR_CODES.GRAPH_DANGLING_REFERENCE,
      `relations reference unknown entities: ${missing.join(", ")}`,
      "create the entities before relating them",
      { missing: [...missing] },
    );
    this.name = "DanglingReferenceError";
  }
}

const EntitySchema = z.object({
  name: z.string().min(1),
  entityType: z.string(),
  observations: z.array(z.string()),
});

const RelationSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  relationType: z.string().min(1),
});

export const GraphSnapshotSchema = z.object({
  version: z.literal(1),
  entities: z.array(EntitySchema),
  relations: z.array(RelationSchema),
});
export type GraphSnapshotDocument = z.infer<typeof GraphSnapshotSchema>;

/** Separator used to build relation identity keys; cannot appear in names typed by users. */
const RELATION_KEY_SEPARATOR = "\u001f";

function relationKey(relation: Relation): string {
  return [relation.from, relation.to, relation.relationType].join(RELATION_KEY_SEPARATOR);
}

function freezeEntity(name: string, entityType: string, observations: readonly string[]): Entity {
  return Object.freeze({ name, entityType, observations: Object.freeze([...observations]) });
}

/** Appends the observations not yet present, keeping first occurrences. */
function appendUnique(existing: readonly string[], incoming: readonly string[]): { merged: string[]; added: string[] } {
  const seen = new Set(existing);
  const added: string[] = [];
  for (const observation of incoming) {
    if (!seen.has(observation)) {
      seen.add(observation);
      added.push(observation);
    }
  }
  return { merged: [...existing, ...added], added };
}

export interface KnowledgeGraphStoreOptions {
  snapshotPath?: string;
  logger?: StructuredLogger;
}

/**
 * Entity/relation graph. Entities and relations are frozen values replaced on
 * change, so snapshots share structure with the live maps without being
 * affected by later writes. Writes are serialised per entity name.
 */
export class KnowledgeGraphStore {
  private readonly entities = new Map<string, Entity>();
  private readonly relations = new Map<string, Relation>();
  private readonly mutex = new KeyedMutex();
  private readonly snapshot: JsonSnapshotFile<GraphSnapshotDocument> | null;
  private readonly logger?: StructuredLogger;

  constructor(options: KnowledgeGraphStoreOptions = {}) {
    this.snapshot = options.snapshotPath ? new JsonSnapshotFile(options.snapshotPath, GraphSnapshotSchema) : null;
    this.logger = options.logger;
  }

  async load(): Promise<void> {
    if (!this.snapshot) {
      return;
    }
    const document = await this.snapshot.load();
    this.entities.clear();
    this.relations.clear();
    for (const entity of document?.entities ?? []) {
      this.entities.set(entity.name, freezeEntity(entity.name, entity.entityType, entity.observations));
    }
    for (const relation of document?.relations ?? []) {
      const frozen = Object.freeze({ ...relation });
      this.relations.set(relationKey(frozen), frozen);
    }
    this.logger?.info("graph_store_loaded", {
      entities: this.entities.size,
      relations: this.relations.size,
      path: this.snapshot.filePath,
    });
  }

  getEntity(name: string): Entity | undefined {
    return this.entities.get(name);
  }

  /**
   * Creates the entities, merging observations into those that already exist
   * (including repeated names within the call). Returns the resulting
   * entities in first-mention order.
   */
  async createEntities(inputs: readonly EntityInput[]): Promise<Entity[]> {
    const names = inputs.map((input) => input.name);
    return this.mutex.runExclusive(names, async () => {
      const touched = new Map<string, Entity>();
      for (const input of inputs) {
        const current = touched.get(input.name) ?? this.entities.get(input.name);
        const next = current
          ? freezeEntity(current.name, current.entityType, appendUnique(current.observations, input.observations ?? []).merged)
          : freezeEntity(input.name, input.entityType, appendUnique([], input.observations ?? []).merged);
        touched.set(input.name, next);
      }
      await this.commit(touched, []);
      this.logger?.info("graph_entities_upserted", { count: touched.size });
      return Array.from(touched.values());
    });
  }

  /**
   * Creates the relations. Every endpoint must exist, otherwise nothing is
   * created. Triples already present are skipped; the newly created
   * relations are returned.
   */
  async createRelations(inputs: readonly Relation[]): Promise<Relation[]> {
    const endpoints = inputs.flatMap((relation) => [relation.from, relation.to]);
    return this.mutex.runExclusive(endpoints, async () => {
      const missing = Array.from(new Set(endpoints.filter((name) => !this.entities.has(name))));
      if (missing.length > 0) {
        throw new DanglingReferenceError(missing);
      }
      const created = new Map<string, Relation>();
      for (const input of inputs) {
        const relation = Object.freeze({ from: input.from, to: input.to, relationType: input.relationType });
        const key = relationKey(relation);
        if (!this.relations.has(key) && !created.has(key)) {
          created.set(key, relation);
        }
      }
      if (created.size > 0) {
        await this.commit([], created);
      }
      this.logger?.info("graph_relations_created", { requested: inputs.length, created: created.size });
      return Array.from(created.values());
    });
  }

  /** Appends observations to existing entities. Fails without writing when an entity is missing. */
  async addObservations(inputs: readonly ObservationInput[]): Promise<ObservationAddition[]> {
    return this.mutex.runExclusive(
      inputs.map((input) => input.entityName),
      async () => {
        for (const input of inputs) {
          if (!this.entities.has(input.entityName)) {
            throw new NotFoundError("entity", input.entityName);
          }
        }
        const touched = new Map<string, Entity>();
        const results: ObservationAddition[] = [];
        for (const input of inputs) {
          const current = touched.get(input.entityName) ?? this.entities.get(input.entityName);
          if (!current) {
            continue;
          }
          const { merged, added } = appendUnique(current.observations, input.contents);
          touched.set(current.name, freezeEntity(current.name, current.entityType, merged));
          results.push({ entityName: current.name, addedObservations: added });
        }
        await this.commit(touched, []);
        return results;
      },
    );
  }

  /** Deletes entities and every relation touching them. Unknown names are ignored. */
  async deleteEntities(names: readonly string[]): Promise<string[]> {
    return this.mutex.runExclusive(names, async () => {
      const removed = Array.from(new Set(names)).filter((name) => this.entities.has(name));
      const gone = new Set(removed);
      const cascaded = Array.from(this.relations)
        .filter(([, relation]) => gone.has(relation.from) || gone.has(relation.to))
        .map(([key]): [string, null] => [key, null]);
      if (removed.length > 0) {
        await this.commit(
          removed.map((name): [string, null] => [name, null]),
          cascaded,
        );
      }
      this.logger?.info("graph_entities_deleted", { entities: removed.length, relations: cascaded.length });
      return removed;
    });
  }

  /** Removes observations by exact text. Unknown entities are ignored. */
  async deleteObservations(deletions: readonly ObservationDeletion[]): Promise<void> {
    await this.mutex.runExclusive(
      deletions.map((deletion) => deletion.entityName),
      async () => {
        const touched = new Map<string, Entity>();
        for (const deletion of deletions) {
          const current = touched.get(deletion.entityName) ?? this.entities.get(deletion.entityName);
          if (!current) {
            continue;
          }
          const drop = new Set(deletion.observations);
          const kept = current.observations.filter((observation) => !drop.has(observation));
          touched.set(current.name, freezeEntity(current.name, current.entityType, kept));
        }
        await this.commit(touched, []);
      },
    );
  }

  /** Removes the given triples. Returns how many existed. */
  async deleteRelations(inputs: readonly Relation[]): Promise<number> {
    return this.mutex.runExclusive(
      inputs.flatMap((relation) => [relation.from, relation.to]),
      async () => {
        const keys = new Set(inputs.map(relationKey).filter((key) => this.relations.has(key)));
        if (keys.size > 0) {
          await this.commit(
            [],
            Array.from(keys, (key): [string, null] => [key, null]),
          );
        }
        return keys.size;
      },
    );
  }

  /**
   * Entities whose name, type or any observation contains `query`
   * (case-insensitive), plus the relations between them.
   */
  searchNodes(query: string): GraphSnapshot {
    const needle = query.toLowerCase();
    const matches = Array.from(this.entities.values()).filter(
      (entity) =>
        entity.name.toLowerCase().includes(needle) ||
        entity.entityType.toLowerCase().includes(needle) ||
        entity.observations.some((observation) => observation.toLowerCase().includes(needle)),
    );
    return this.subgraph(matches);
  }

  /** Entities with the given names (unknown names skipped) and the relations between them. */
  openNodes(names: readonly string[]): GraphSnapshot {
    const found = Array.from(new Set(names)).flatMap((name) => {
      const entity = this.entities.get(name);
      return entity ? [entity] : [];
    });
    return this.subgraph(found);
  }

  readGraph(): GraphSnapshot {
    return Object.freeze({
      entities: Object.freeze(Array.from(this.entities.values())),
      relations: Object.freeze(Array.from(this.relations.values())),
    });
  }

  private subgraph(entities: Entity[]): GraphSnapshot {
    const names = new Set(entities.map((entity) => entity.name));
    const relations = Array.from(this.relations.values()).filter(
      (relation) => names.has(relation.from) && names.has(relation.to),
    );
    return Object.freeze({ entities: Object.freeze(entities), relations: Object.freeze(relations) });
  }

  /** Applies entity and relation changes, undoing both when the snapshot cannot be saved. */
  private async commit(
    entityChanges: Iterable<readonly [string, Entity | null]>,
    relationChanges: Iterable<readonly [string, Relation | null]>,
  ): Promise<void> {
    const revertEntities = applyMapChanges(this.entities, entityChanges);
    const revertRelations = applyMapChanges(this.relations, relationChanges);
    try {
      await this.persist();
    } catch (error) {
      revertRelations();
      revertEntities();
      this.logger?.error("graph_persist_failed", { message: describeError(error) });
      throw error;
    }
  }

  private async persist(): Promise<void> {
    if (!this.snapshot) {
      return;
    }
    await this.snapshot.save({
      version: 1,
      entities: Array.from(this.entities.values(), (entity) => ({
        name: entity.name,
        entityType: entity.entityType,
        observations: [...entity.observations],
      })),
      relations: Array.from(this.relations.values(), (relation) => ({ ...relation })),
    });
  }
}
