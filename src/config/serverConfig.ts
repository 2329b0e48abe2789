import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import type { DispatchDefaults } from "../dispatch/coordinator.js";
import { parseEndpoint } from "../dispatch/endpoint.js";
import { describeError, OrchestratorError } from "../errors.js";
import type { ServerDescriptorInput } from "../registry/serverRegistry.js";
import { ERROR_CODES } from "../types.js";

/** Raised when the server configuration cannot be read, parsed or validated. */
export class ConfigurationError extends OrchestratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ERROR_CODES.CONFIG_INVALID, message, "fix the configuration file and restart", details);
    this.name = "ConfigurationError";
  }
}

const AuthSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("none") }).strict(),
  z.object({ type: z.literal("basic"), username: z.string().min(1), password: z.string().min(1) }).strict(),
  z.object({ type: z.literal("bearer"), token: z.string().min(1) }).strict(),
]);

const ServerEntrySchema = z
  .object({
    name: z
      .string()
      .min(1)
      .max(128)
      .regex(/^[a-z0-9][a-z0-9._-]*$/i, "server names use letters, digits, dot, dash and underscore"),
    endpoint: z.string().min(1),
    auth: AuthSchema.default({ type: "none" }),
    /** `filesystem` servers must declare the directories they may touch. */
    kind: z.enum(["generic", "filesystem"]).default("generic"),
    capabilities: z.array(z.string().min(1)).min(1),
    allowedDirectories: z.array(z.string().min(1)).optional(),
  })
  .strict();

const DispatchSectionSchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(20).optional(),
    baseDelayMs: z.number().int().min(0).optional(),
    maxDelayMs: z.number().int().min(0).optional(),
    jitterRatio: z.number().min(0).max(1).optional(),
    attemptTimeoutMs: z.number().int().min(1).optional(),
    probeIntervalMs: z.number().int().min(0).optional(),
    failureThreshold: z.number().int().min(1).max(100).optional(),
  })
  .strict();

const ReasoningSectionSchema = z
  .object({
    maxSessions: z.number().int().min(1).optional(),
    maxThoughtsPerSession: z.number().int().min(1).optional(),
  })
  .strict();

export const ServerConfigSchema = z
  .object({
    servers: z.array(ServerEntrySchema).default([]),
    dispatch: DispatchSectionSchema.default({}),
    reasoning: ReasoningSectionSchema.default({}),
  })
  .strict();

export interface ConductorConfig {
  servers: ServerDescriptorInput[];
  dispatch: Partial<DispatchDefaults>;
  failureThreshold?: number;
  reasoning: { maxSessions?: number; maxThoughtsPerSession?: number };
}

/** Attempts JSON first, then YAML. */
function parseDocument(source: string, origin: string): unknown {
  try {
    return JSON.parse(source);
  } catch {
    try {
      return parseYaml(source);
    } catch (error) {
      throw new ConfigurationError(`unable to parse configuration ${origin}`, { message: describeError(error) });
    }
  }
}

/**
 * Validates a configuration document (object, JSON or YAML text). Every rule
 * is checked at load time: unique names, known auth types, endpoint syntax,
 * credentials only on HTTP endpoints, absolute allow-lists, and an allow-list
 * for every filesystem server.
 */
export function parseServerConfig(document: unknown, origin = "<inline>"): ConductorConfig {
  const payload = typeof document === "string" ? parseDocument(document, origin) : document;
  const parsed = ServerConfigSchema.safeParse(payload ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`configuration ${origin} is invalid`, { issues: parsed.error.issues });
  }
  const config = parsed.data;

  const seen = new Set<string>();
  const servers: ServerDescriptorInput[] = [];
  for (const entry of config.servers) {
    if (seen.has(entry.name)) {
      throw new ConfigurationError(`duplicate server name '${entry.name}'`, { server: entry.name });
    }
    seen.add(entry.name);

    const endpoint = parseEndpoint(entry.endpoint);
    if (!endpoint) {
      throw new ConfigurationError(`server '${entry.name}' has an invalid endpoint '${entry.endpoint}'`, {
        server: entry.name,
        endpoint: entry.endpoint,
      });
    }
    if (entry.auth.type !== "none" && endpoint.kind !== "http") {
      throw new ConfigurationError(`server '${entry.name}' declares ${entry.auth.type} auth on a ${endpoint.kind} endpoint`, {
        server: entry.name,
      });
    }

    const allowed = entry.allowedDirectories ?? [];
    if (entry.kind === "filesystem" && allowed.length === 0) {
      throw new ConfigurationError(`filesystem server '${entry.name}' must declare allowedDirectories`, {
        server: entry.name,
      });
    }
    const relative = allowed.filter((dir) => !path.isAbsolute(dir));
    if (relative.length > 0) {
      throw new ConfigurationError(`server '${entry.name}' lists relative allowedDirectories`, {
        server: entry.name,
        directories: relative,
      });
    }

    servers.push({
      name: entry.name,
      endpoint: entry.endpoint,
      auth: entry.auth,
      capabilities: entry.capabilities,
      allowedDirectories: allowed.map((dir) => path.resolve(dir)),
    });
  }

  const { failureThreshold, ...dispatch } = config.dispatch;
  return { servers, dispatch, failureThreshold, reasoning: config.reasoning };
}

/** Reads and validates the configuration file. */
export async function loadServerConfig(filePath: string): Promise<ConductorConfig> {
  let source: string;
  try {
    source = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`unable to read configuration ${filePath}`, { message: describeError(error) });
  }
  return parseServerConfig(source, filePath);
}
