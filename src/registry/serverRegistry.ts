import { OrchestratorError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { ERROR_CODES } from "../types.js";
import { applyOutcome, DEFAULT_FAILURE_THRESHOLD, healthRank, type HealthState } from "./health.js";

/** Authentication block attached to a server descriptor. */
export type ServerAuth =
  | { type: "none" }
  | { type: "basic"; username: string; password: string }
  | { type: "bearer"; token: string };

/** Descriptor accepted by {@link ServerRegistry.register}. */
export interface ServerDescriptorInput {
  name: string;
  endpoint: string;
  auth?: ServerAuth;
  capabilities: Iterable<string>;
  /** Directories a filesystem-capable server may touch. Absolute paths. */
  allowedDirectories?: readonly string[];
}

/** Defensive copy of a registered descriptor. */
export interface ServerDescriptor {
  name: string;
  endpoint: string;
  auth: ServerAuth;
  capabilities: string[];
  allowedDirectories: string[];
  health: HealthState;
  consecutiveFailures: number;
  lastFailureAt: number | null;
  registeredAt: number;
}

/** Transition emitted when an outcome changes the health state of a server. */
export interface HealthChange {
  server: string;
  previous: HealthState;
  current: HealthState;
  consecutiveFailures: number;
}

interface ServerEntry {
  name: string;
  endpoint: string;
  auth: ServerAuth;
  capabilities: Set<string>;
  allowedDirectories: string[];
  health: HealthState;
  consecutiveFailures: number;
  lastFailureAt: number | null;
  registeredAt: number;
  ordinal: number;
}

export class UnknownServerError extends OrchestratorError {
  constructor(readonly server: string) {
    super(ERROR_CODES.REGISTRY_UNKNOWN_SERVER, `server '${server}' is not registered`, "list servers via serverStatus", {
      server,
    });
    this.name = "UnknownServerError";
  }
}

export class CapabilityUnsupportedError extends OrchestratorError {
  constructor(
    readonly server: string | null,
    readonly operation: string,
  ) {
    super(
      ERROR_CODES.REGISTRY_CAPABILITY_UNSUPPORTED,
      server === null
        ? `no registered server declares operation '${operation}'`
        : `server '${server}' does not declare operation '${operation}'`,
      "check the capabilities declared in the server configuration",
      { server, operation },
    );
    this.name = "CapabilityUnsupportedError";
  }
}

export class DuplicateServerError extends OrchestratorError {
  constructor(readonly server: string) {
    super(ERROR_CODES.REGISTRY_DUPLICATE_SERVER, `server '${server}' is already registered`, "server names must be unique", {
      server,
    });
    this.name = "DuplicateServerError";
  }
}

export interface ServerRegistryOptions {
  /** Consecutive failures before a server drops one health step. */
  failureThreshold?: number;
  now?: () => number;
  logger?: StructuredLogger;
}

/**
 * Holds the descriptors of reachable capability servers. Health is only ever
 * mutated through {@link reportOutcome}, which the dispatch coordinator calls
 * after every attempt. Updates are synchronous, so concurrent dispatches to
 * the same server cannot interleave inside one transition.
 */
export class ServerRegistry {
  private readonly entries = new Map<string, ServerEntry>();
  private readonly failureThreshold: number;
  private readonly now: () => number;
  private readonly logger?: StructuredLogger;
  private ordinal = 0;

  constructor(options: ServerRegistryOptions = {}) {
    this.failureThreshold = Math.max(1, Math.trunc(options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD));
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger;
  }

  register(input: ServerDescriptorInput): ServerDescriptor {
    if (this.entries.has(input.name)) {
      throw new DuplicateServerError(input.name);
    }
    const entry: ServerEntry = {
      name: input.name,
      endpoint: input.endpoint,
      auth: input.auth ?? { type: "none" },
      capabilities: new Set(input.capabilities),
      allowedDirectories: [...(input.allowedDirectories ?? [])],
      health: "healthy",
      consecutiveFailures: 0,
      lastFailureAt: null,
      registeredAt: this.now(),
      ordinal: this.ordinal++,
    };
    this.entries.set(entry.name, entry);
    this.logger?.info("server_registered", {
      server: entry.name,
      endpoint: entry.endpoint,
      auth: entry.auth.type,
      capabilities: entry.capabilities.size,
    });
    return toDescriptor(entry);
  }

  /** Removes a server. Returns whether a descriptor was removed. */
  unregister(name: string): boolean {
    const removed = this.entries.delete(name);
    if (removed) {
      this.logger?.info("server_unregistered", { server: name });
    }
    return removed;
  }

  /**
   * Replaces the whole catalogue. The new list is validated for duplicate
   * names before anything is touched, so a rejected reconfiguration leaves
   * the registry unchanged.
   */
  replaceAll(inputs: readonly ServerDescriptorInput[]): ServerDescriptor[] {
    const seen = new Set<string>();
    for (const input of inputs) {
      if (seen.has(input.name)) {
        throw new DuplicateServerError(input.name);
      }
      seen.add(input.name);
    }
    this.entries.clear();
    return inputs.map((input) => this.register(input));
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Returns the descriptor, optionally requiring a declared capability. */
  resolve(name: string, requiredCapability?: string): ServerDescriptor {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new UnknownServerError(name);
    }
    if (requiredCapability !== undefined && !entry.capabilities.has(requiredCapability)) {
      throw new CapabilityUnsupportedError(name, requiredCapability);
    }
    return toDescriptor(entry);
  }

  /**
   * Servers declaring the operation, healthiest first; registration order
   * breaks ties so the configured primary wins over its fallbacks.
   */
  findByCapability(operation: string): ServerDescriptor[] {
    return Array.from(this.entries.values())
      .filter((entry) => entry.capabilities.has(operation))
      .sort((a, b) => healthRank(a.health) - healthRank(b.health) || a.ordinal - b.ordinal)
      .map(toDescriptor);
  }

  /** Defensive copy of one descriptor, or `undefined` when unknown. */
  snapshot(name: string): ServerDescriptor | undefined {
    const entry = this.entries.get(name);
    return entry ? toDescriptor(entry) : undefined;
  }

  list(): ServerDescriptor[] {
    return Array.from(this.entries.values(), toDescriptor);
  }

  /**
   * Records the outcome of one attempt and applies the health transition.
   * Returns the change when the state moved, `null` otherwise.
   */
  reportOutcome(name: string, success: boolean, at: number = this.now()): HealthChange | null {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new UnknownServerError(name);
    }
    const previous = entry.health;
    const next = applyOutcome(
      { state: entry.health, consecutiveFailures: entry.consecutiveFailures },
      success ? "success" : "failure",
      this.failureThreshold,
    );
    entry.health = next.state;
    entry.consecutiveFailures = next.consecutiveFailures;
    if (!success) {
      entry.lastFailureAt = at;
    }
    if (previous === next.state) {
      return null;
    }
    const change: HealthChange = {
      server: name,
      previous,
      current: next.state,
      consecutiveFailures: next.consecutiveFailures,
    };
    const level = healthRank(next.state) > healthRank(previous) ? "warn" : "info";
    this.logger?.[level]("server_health_changed", change);
    return change;
  }
}

function toDescriptor(entry: ServerEntry): ServerDescriptor {
  return {
    name: entry.name,
    endpoint: entry.endpoint,
    auth: { ...entry.auth },
    capabilities: Array.from(entry.capabilities),
    allowedDirectories: [...entry.allowedDirectories],
    health: entry.health,
    consecutiveFailures: entry.consecutiveFailures,
    lastFailureAt: entry.lastFailureAt,
    registeredAt: entry.registeredAt,
  };
}
