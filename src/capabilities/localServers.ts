import { LocalCapabilityServer } from "../dispatch/transport.js";
import type { ServerDescriptorInput } from "../registry/serverRegistry.js";
import { ERROR_CODES } from "../types.js";
import {
  AddObservationsInputSchema,
  CreateEntitiesInputSchema,
  CreateRelationsInputSchema,
  DeleteEntitiesInputSchema,
  DeleteObservationsInputSchema,
  DeleteRelationsInputSchema,
  handleAddObservations,
  handleCreateEntities,
  handleCreateRelations,
  handleDeleteEntities,
  handleDeleteObservations,
  handleDeleteRelations,
  handleOpenNodes,
  handleReadGraph,
  handleSearchNodes,
  OpenNodesInputSchema,
  ReadGraphInputSchema,
  SearchNodesInputSchema,
  type GraphToolContext,
} from "../tools/graphTools.js";
import {
  CreateMemoryInputSchema,
  DeleteMemoryInputSchema,
  handleCreateMemory,
  handleDeleteMemory,
  handleMergeMemory,
  handleSearchMemory,
  handleUpdateMemory,
  MergeMemoryInputSchema,
  SearchMemoryInputSchema,
  UpdateMemoryInputSchema,
  type MemoryToolContext,
} from "../tools/memoryTools.js";
import { parseToolInput } from "../tools/shared.js";
import {
  CloseThinkingSessionInputSchema,
  handleCloseThinkingSession,
  handleSequentialThinking,
  SequentialThinkingInputSchema,
  type ThinkingToolContext,
} from "../tools/thinkingTools.js";

/** Identifiers of the capability servers hosted in-process (`local:<id>`). */
export const LOCAL_SERVER_IDS = {
  memory: "memory",
  knowledgeGraph: "knowledge-graph",
  sequentialThinking: "sequential-thinking",
} as const;

export function createMemoryServer(context: MemoryToolContext): LocalCapabilityServer {
  const code = ERROR_CODES.MEMORY_INVALID_INPUT;
  return new LocalCapabilityServer(LOCAL_SERVER_IDS.memory, {
    createMemory: async (payload) => handleCreateMemory(context, parseToolInput(CreateMemoryInputSchema, payload, code)),
    searchMemory: async (payload) => handleSearchMemory(context, parseToolInput(SearchMemoryInputSchema, payload, code)),
    updateMemory: async (payload) => handleUpdateMemory(context, parseToolInput(UpdateMemoryInputSchema, payload, code)),
    mergeMemory: async (payload) => handleMergeMemory(context, parseToolInput(MergeMemoryInputSchema, payload, code)),
    deleteMemory: async (payload) => handleDeleteMemory(context, parseToolInput(DeleteMemoryInputSchema, payload, code)),
  });
}

export function createKnowledgeGraphServer(context: GraphToolContext): LocalCapabilityServer {
  const code = ERROR_CODES.GRAPH_INVALID_INPUT;
  return new LocalCapabilityServer(LOCAL_SERVER_IDS.knowledgeGraph, {
    createEntities: async (payload) =>
      handleCreateEntities(context, parseToolInput(CreateEntitiesInputSchema, payload, code)),
    createRelations: async (payload) =>
      handleCreateRelations(context, parseToolInput(CreateRelationsInputSchema, payload, code)),
    addObservations: async (payload) =>
      handleAddObservations(context, parseToolInput(AddObservationsInputSchema, payload, code)),
    deleteEntities: async (payload) =>
      handleDeleteEntities(context, parseToolInput(DeleteEntitiesInputSchema, payload, code)),
    deleteObservations: async (payload) =>
      handleDeleteObservations(context, parseToolInput(DeleteObservationsInputSchema, payload, code)),
    deleteRelations: async (payload) =>
      handleDeleteRelations(context, parseToolInput(DeleteRelationsInputSchema, payload, code)),
    searchNodes: async (payload) => handleSearchNodes(context, parseToolInput(SearchNodesInputSchema, payload, code)),
    openNodes: async (payload) => handleOpenNodes(context, parseToolInput(OpenNodesInputSchema, payload, code)),
    readGraph: async (payload) => {
      parseToolInput(ReadGraphInputSchema, payload, code);
      return handleReadGraph(context);
    },
  });
}

export function createSequentialThinkingServer(context: ThinkingToolContext): LocalCapabilityServer {
  const code = ERROR_CODES.THINK_INVALID_INPUT;
  return new LocalCapabilityServer(LOCAL_SERVER_IDS.sequentialThinking, {
    sequentialThinking: async (payload) =>
      handleSequentialThinking(context, parseToolInput(SequentialThinkingInputSchema, payload, code)),
    closeThinkingSession: async (payload) =>
      handleCloseThinkingSession(context, parseToolInput(CloseThinkingSessionInputSchema, payload, code)),
  });
}

/** Registry descriptor for a mounted local server, named after its identifier. */
export function localServerDescriptor(server: LocalCapabilityServer): ServerDescriptorInput {
  return {
    name: server.id,
    endpoint: `local:${server.id}`,
    auth: { type: "none" },
    capabilities: server.operations(),
  };
}
