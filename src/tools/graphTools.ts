import { z } from "zod";

import type { Entity, GraphSnapshot, KnowledgeGraphStore, Relation } from "../knowledge/graphStore.js";
import type { StructuredLogger } from "../logger.js";

/** Context injected when serving knowledge graph operations. */
export interface GraphToolContext {
  graph: KnowledgeGraphStore;
  logger: StructuredLogger;
}

const EntityNameSchema = z.string().min(1).max(256);

const EntityInputSchema = z
  .object({
    name: EntityNameSchema,
    entityType: z.string().min(1).max(128),
    observations: z.array(z.string().min(1).max(4_096)).max(256).default([]),
  })
  .strict();

const RelationInputSchema = z
  .object({
    from: EntityNameSchema,
    to: EntityNameSchema,
    relationType: z.string().min(1).max(128),
  })
  .strict();

export const CreateEntitiesInputSchema = z.object({ entities: z.array(EntityInputSchema).min(1).max(500) }).strict();
export const CreateEntitiesInputShape = CreateEntitiesInputSchema.shape;

export const CreateRelationsInputSchema = z.object({ relations: z.array(RelationInputSchema).min(1).max(500) }).strict();
export const CreateRelationsInputShape = CreateRelationsInputSchema.shape;

export const AddObservationsInputSchema = z
  .object({
    observations: z
      .array(
        z
          .object({
            entityName: EntityNameSchema,
            contents: z.array(z.string().min(1).max(4_096)).min(1).max(256),
          })
          .strict(),
      )
      .min(1)
      .max(500),
  })
  .strict();
export const AddObservationsInputShape = AddObservationsInputSchema.shape;

export const DeleteEntitiesInputSchema = z.object({ entityNames: z.array(EntityNameSchema).min(1).max(500) }).strict();
export const DeleteEntitiesInputShape = DeleteEntitiesInputSchema.shape;

export const DeleteObservationsInputSchema = z
  .object({
    deletions: z
      .array(
        z
          .object({
            entityName: EntityNameSchema,
            observations: z.array(z.string()).min(1).max(256),
          })
          .strict(),
      )
      .min(1)
      .max(500),
  })
  .strict();
export const DeleteObservationsInputShape = DeleteObservationsInputSchema.shape;

export const DeleteRelationsInputSchema = CreateRelationsInputSchema;
export const DeleteRelationsInputShape = DeleteRelationsInputSchema.shape;

export const SearchNodesInputSchema = z.object({ query: z.string().max(1_024) }).strict();
export const SearchNodesInputShape = SearchNodesInputSchema.shape;

export const OpenNodesInputSchema = z.object({ names: z.array(EntityNameSchema).max(500) }).strict();
export const OpenNodesInputShape = OpenNodesInputSchema.shape;

export const ReadGraphInputSchema = z.object({}).strict();
export const ReadGraphInputShape = ReadGraphInputSchema.shape;

export interface EntityPayload {
  name: string;
  entityType: string;
  observations: string[];
}

export interface RelationPayload {
  from: string;
  to: string;
  relationType: string;
}

export interface GraphPayload {
  entities: EntityPayload[];
  relations: RelationPayload[];
}

function serialiseEntity(entity: Entity): EntityPayload {
  return { name: entity.name, entityType: entity.entityType, observations: [...entity.observations] };
}

function serialiseRelation(relation: Relation): RelationPayload {
  return { from: relation.from, to: relation.to, relationType: relation.relationType };
}

function serialiseGraph(snapshot: GraphSnapshot): GraphPayload {
  return {
    entities: snapshot.entities.map(serialiseEntity),
    relations: snapshot.relations.map(serialiseRelation),
  };
}

export async function handleCreateEntities(
  context: GraphToolContext,
  input: z.infer<typeof CreateEntitiesInputSchema>,
): Promise<{ entities: EntityPayload[] }> {
  const entities = await context.graph.createEntities(input.entities);
  return { entities: entities.map(serialiseEntity) };
}

export async function handleCreateRelations(
  context: GraphToolContext,
  input: z.infer<typeof CreateRelationsInputSchema>,
): Promise<{ relations: RelationPayload[] }> {
  const relations = await context.graph.createRelations(input.relations);
  return { relations: relations.map(serialiseRelation) };
}

export async function handleAddObservations(
  context: GraphToolContext,
  input: z.infer<typeof AddObservationsInputSchema>,
): Promise<{ results: Array<{ entityName: string; addedObservations: string[] }> }> {
  const results = await context.graph.addObservations(input.observations);
  return { results };
}

export async function handleDeleteEntities(
  context: GraphToolContext,
  input: z.infer<typeof DeleteEntitiesInputSchema>,
): Promise<{ deleted: string[] }> {
  const deleted = await context.graph.deleteEntities(input.entityNames);
  return { deleted };
}

export async function handleDeleteObservations(
  context: GraphToolContext,
  input: z.infer<typeof DeleteObservationsInputSchema>,
): Promise<{ entityNames: string[] }> {
  await context.graph.deleteObservations(input.deletions);
  return { entityNames: input.deletions.map((deletion) => deletion.entityName) };
}

export async function handleDeleteRelations(
  context: GraphToolContext,
  input: z.infer<typeof DeleteRelationsInputSchema>,
): Promise<{ deleted: number }> {
  const deleted = await context.graph.deleteRelations(input.relations);
  return { deleted };
}

export function handleSearchNodes(context: GraphToolContext, input: z.infer<typeof SearchNodesInputSchema>): GraphPayload {
  const result = serialiseGraph(context.graph.searchNodes(input.query));
  context.logger.info("graph_search_nodes", {
    query_length: input.query.length,
    entities: result.entities.length,
    relations: result.relations.length,
  });
  return result;
}

export function handleOpenNodes(context: GraphToolContext, input: z.infer<typeof OpenNodesInputSchema>): GraphPayload {
  return serialiseGraph(context.graph.openNodes(input.names));
}

export function handleReadGraph(context: GraphToolContext): GraphPayload {
  return serialiseGraph(context.graph.readGraph());
}
