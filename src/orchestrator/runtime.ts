import path from "node:path";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ZodRawShape } from "zod";

import {
  createKnowledgeGraphServer,
  createMemoryServer,
  createSequentialThinkingServer,
  localServerDescriptor,
} from "../capabilities/localServers.js";
import type { ConductorConfig } from "../config/serverConfig.js";
import { DispatchCoordinator, type DispatchDefaults } from "../dispatch/coordinator.js";
import { createMcpTransport } from "../dispatch/mcpTransport.js";
import { TransportRouter, type RemoteTransportFactory } from "../dispatch/transport.js";
import { KnowledgeGraphStore } from "../knowledge/graphStore.js";
import { StructuredLogger } from "../logger.js";
import { MemoryStore } from "../memory/store.js";
import { SequentialReasoningEngine } from "../reasoning/sessionManager.js";
import { ServerRegistry } from "../registry/serverRegistry.js";
import {
  GRAPH_ERROR_CODES,
  MEMORY_ERROR_CODES,
  THINK_ERROR_CODES,
  toolError,
  WORKFLOW_ERROR_CODES,
  DISPATCH_ERROR_CODES,
  type ToolErrorCodes,
} from "../server/toolErrors.js";
import {
  AddObservationsInputShape,
  CreateEntitiesInputShape,
  CreateRelationsInputShape,
  DeleteEntitiesInputShape,
  DeleteObservationsInputShape,
  DeleteRelationsInputShape,
  OpenNodesInputShape,
  ReadGraphInputShape,
  SearchNodesInputShape,
} from "../tools/graphTools.js";
import {
  CreateMemoryInputShape,
  DeleteMemoryInputShape,
  MergeMemoryInputShape,
  SearchMemoryInputShape,
  UpdateMemoryInputShape,
} from "../tools/memoryTools.js";
import { buildToolSuccessResult, toStructuredContent } from "../tools/shared.js";
import { CloseThinkingSessionInputShape, SequentialThinkingInputShape } from "../tools/thinkingTools.js";
import {
  CaptureInsightInputSchema,
  CaptureInsightInputShape,
  handleCaptureInsight,
  handleServerStatus,
  ServerStatusInputShape,
} from "../tools/workflowTools.js";
import { WorkflowCoordinator } from "../workflow/coordinator.js";

export const CONDUCTOR_NAME = "mcp-conductor";
export const CONDUCTOR_VERSION = "0.1.0";

export interface ConductorOptions {
  logger?: StructuredLogger;
  config?: ConductorConfig;
  /** Directory receiving `memory.json` and `graph.json`. Stores stay in memory without it. */
  dataDir?: string;
  /** Mount the in-process memory, knowledge-graph and sequential-thinking servers. */
  localServers?: boolean;
  /** Overrides applied on top of the configuration's dispatch section. */
  dispatch?: Partial<DispatchDefaults>;
  remoteFactory?: RemoteTransportFactory;
  random?: () => number;
  now?: () => number;
}

/** Wired orchestration engine and the MCP facade exposing it. */
export interface Conductor {
  server: McpServer;
  logger: StructuredLogger;
  registry: ServerRegistry;
  router: TransportRouter;
  coordinator: DispatchCoordinator;
  memory: MemoryStore;
  graph: KnowledgeGraphStore;
  reasoning: SequentialReasoningEngine;
  workflows: WorkflowCoordinator;
  close(): Promise<void>;
}

/** Builds the stores, registers the servers and exposes every tool on a new MCP server. */
export async function createConductor(options: ConductorOptions = {}): Promise<Conductor> {
  const logger = options.logger ?? new StructuredLogger();
  const config = options.config;
  const now = options.now ?? (() => Date.now());

  const memory = new MemoryStore({
    snapshotPath: options.dataDir ? path.join(options.dataDir, "memory.json") : undefined,
    now,
    logger,
  });
  const graph = new KnowledgeGraphStore({
    snapshotPath: options.dataDir ? path.join(options.dataDir, "graph.json") : undefined,
    logger,
  });
  await Promise.all([memory.load(), graph.load()]);

  const reasoning = new SequentialReasoningEngine({ ...config?.reasoning, now, logger });
  const registry = new ServerRegistry({ failureThreshold: config?.failureThreshold, now, logger });
  const router = new TransportRouter({
    remoteFactory: options.remoteFactory ?? ((descriptor) => createMcpTransport(descriptor, logger)),
    logger,
  });
  const coordinator = new DispatchCoordinator({
    registry,
    transports: router,
    logger,
    defaults: { ...config?.dispatch, ...options.dispatch },
    random: options.random,
    now,
  });
  const workflows = new WorkflowCoordinator(logger);

  if (options.localServers ?? true) {
    const locals = [
      createMemoryServer({ store: memory, logger }),
      createKnowledgeGraphServer({ graph, logger }),
      createSequentialThinkingServer({ engine: reasoning, logger }),
    ];
    for (const local of locals) {
      router.mountLocal(local);
      registry.register(localServerDescriptor(local));
    }
  }
  for (const descriptor of config?.servers ?? []) {
    registry.register(descriptor);
  }

  const server = new McpServer({ name: CONDUCTOR_NAME, version: CONDUCTOR_VERSION });
  const conductor: Conductor = {
    server,
    logger,
    registry,
    router,
    coordinator,
    memory,
    graph,
    reasoning,
    workflows,
    async close() {
      await server.close();
      await router.closeAll();
      await logger.flush();
    },
  };
  registerConductorTools(conductor);
  logger.info("conductor_ready", {
    servers: registry.list().length,
    data_dir: options.dataDir ?? null,
    memories: memory.size(),
  });
  return conductor;
}

/**
 * Registers a tool whose call is forwarded to the best server declaring the
 * operation of the same name.
 */
function registerDispatchedTool<Shape extends ZodRawShape>(
  conductor: Conductor,
  name: string,
  title: string,
  description: string,
  inputSchema: Shape,
  codes: ToolErrorCodes,
): void {
  conductor.server.registerTool<ZodRawShape, ZodRawShape>(name, { title, description, inputSchema }, async (input, extra) => {
    try {
      const outcome = await conductor.coordinator.invokeCapability(name, input, { signal: extra.signal });
      if (!outcome.ok) {
        return toolError(conductor.logger, name, outcome.failure, codes);
      }
      return buildToolSuccessResult(name, toStructuredContent(outcome.value));
    } catch (error) {
      return toolError(conductor.logger, name, error, codes);
    }
  });
}

function registerConductorTools(conductor: Conductor): void {
  const memoryTools: Array<[string, string, string, ZodRawShape]> = [
    ["createMemory", "Create memory", "Stores a memory record and returns it with its identifier.", CreateMemoryInputShape],
    ["searchMemory", "Search memory", "Ranks memories by tag overlap, then text matches, then recency.", SearchMemoryInputShape],
    ["updateMemory", "Update memory", "Replaces the fields present in the patch.", UpdateMemoryInputShape],
    ["mergeMemory", "Merge memories", "Folds two memories into the earlier one.", MergeMemoryInputShape],
    ["deleteMemory", "Delete memory", "Deletes a memory; unknown identifiers are not an error.", DeleteMemoryInputShape],
  ];
  for (const [name, title, description, shape] of memoryTools) {
    registerDispatchedTool(conductor, name, title, description, shape, MEMORY_ERROR_CODES);
  }

  const graphTools: Array<[string, string, string, ZodRawShape]> = [
    ["createEntities", "Create entities", "Creates entities, merging observations into existing names.", CreateEntitiesInputShape],
    ["createRelations", "Create relations", "Creates relations between existing entities (all or nothing).", CreateRelationsInputShape],
    ["addObservations", "Add observations", "Appends observations to existing entities.", AddObservationsInputShape],
    ["deleteEntities", "Delete entities", "Deletes entities and their relations.", DeleteEntitiesInputShape],
    ["deleteObservations", "Delete observations", "Removes observations by exact text.", DeleteObservationsInputShape],
    ["deleteRelations", "Delete relations", "Removes relations by triple.", DeleteRelationsInputShape],
    ["searchNodes", "Search nodes", "Case-insensitive search over names, types and observations.", SearchNodesInputShape],
    ["openNodes", "Open nodes", "Returns the named entities and the relations between them.", OpenNodesInputShape],
    ["readGraph", "Read graph", "Returns a snapshot of every entity and relation.", ReadGraphInputShape],
  ];
  for (const [name, title, description, shape] of graphTools) {
    registerDispatchedTool(conductor, name, title, description, shape, GRAPH_ERROR_CODES);
  }

  registerDispatchedTool(
    conductor,
    "sequentialThinking",
    "Sequential thinking",
    "Records a reasoning step with optional branching and revision.",
    SequentialThinkingInputShape,
    THINK_ERROR_CODES,
  );
  registerDispatchedTool(
    conductor,
    "closeThinkingSession",
    "Close thinking session",
    "Discards a reasoning session and every thought recorded in it.",
    CloseThinkingSessionInputShape,
    THINK_ERROR_CODES,
  );

  conductor.server.registerTool(
    "captureInsight",
    {
      title: "Capture insight",
      description: "Stores an insight as a memory, attaches it to entities and relates them.",
      inputSchema: CaptureInsightInputShape,
    },
    async (input, extra) => {
      try {
        const parsed = CaptureInsightInputSchema.parse(input);
        const result = await handleCaptureInsight(conductor, parsed, extra.signal);
        return buildToolSuccessResult("captureInsight", toStructuredContent(result));
      } catch (error) {
        return toolError(conductor.logger, "captureInsight", error, WORKFLOW_ERROR_CODES);
      }
    },
  );

  conductor.server.registerTool(
    "serverStatus",
    {
      title: "Server status",
      description: "Lists registered capability servers with their health.",
      inputSchema: ServerStatusInputShape,
    },
    async () => {
      try {
        return buildToolSuccessResult("serverStatus", toStructuredContent(handleServerStatus(conductor.registry)));
      } catch (error) {
        return toolError(conductor.logger, "serverStatus", error, DISPATCH_ERROR_CODES);
      }
    },
  );
}
