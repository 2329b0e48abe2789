import { OrchestratorError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { CapabilityUnsupportedError, type ServerDescriptor } from "../registry/serverRegistry.js";
import { ERROR_CODES } from "../types.js";
import { parseEndpoint } from "./endpoint.js";

/** One call routed to a capability server. */
export interface CapabilityRequest {
  server: ServerDescriptor;
  operation: string;
  payload: unknown;
  /** Aborted when the attempt times out. */
  signal: AbortSignal;
  timeoutMs: number;
}

/** Uniform contract consumed by the dispatch coordinator. */
export interface CapabilityTransport {
  call(request: CapabilityRequest): Promise<unknown>;
  close?(): Promise<void>;
}

export interface CapabilityCallContext {
  server: string;
  signal: AbortSignal;
}

export type CapabilityHandler = (payload: unknown, context: CapabilityCallContext) => Promise<unknown>;

/**
 * Capability server hosted in this process and addressed as `local:<id>`.
 * Each operation is a handler validating its own payload.
 */
export class LocalCapabilityServer implements CapabilityTransport {
  private readonly handlers: ReadonlyMap<string, CapabilityHandler>;

  constructor(
    readonly id: string,
    handlers: Record<string, CapabilityHandler>,
  ) {
    this.handlers = new Map(Object.entries(handlers));
  }

  operations(): string[] {
    return Array.from(this.handlers.keys());
  }

  async call(request: CapabilityRequest): Promise<unknown> {
    const handler = this.handlers.get(request.operation);
    if (!handler) {
      throw new CapabilityUnsupportedError(request.server.name, request.operation);
    }
    return handler(request.payload, { server: request.server.name, signal: request.signal });
  }
}

/** Builds the transport used for `stdio:` and `http(s)://` endpoints. */
export type RemoteTransportFactory = (descriptor: ServerDescriptor) => CapabilityTransport;

export interface TransportRouterOptions {
  remoteFactory?: RemoteTransportFactory;
  logger?: StructuredLogger;
}

interface CachedRemote {
  endpoint: string;
  transport: CapabilityTransport;
}

/**
 * Maps descriptors to transports. Local servers are mounted explicitly;
 * remote transports are created lazily on first use and cached per server
 * until the endpoint changes.
 */
export class TransportRouter {
  private readonly local = new Map<string, LocalCapabilityServer>();
  private readonly remote = new Map<string, CachedRemote>();
  private readonly remoteFactory?: RemoteTransportFactory;
  private readonly logger?: StructuredLogger;

  constructor(options: TransportRouterOptions = {}) {
    this.remoteFactory = options.remoteFactory;
    this.logger = options.logger;
  }

  mountLocal(server: LocalCapabilityServer): void {
    this.local.set(server.id, server);
  }

  localServer(id: string): LocalCapabilityServer | undefined {
    return this.local.get(id);
  }

  resolve(descriptor: ServerDescriptor): CapabilityTransport {
    const endpoint = parseEndpoint(descriptor.endpoint);
    if (!endpoint) {
      throw new OrchestratorError(
        ERROR_CODES.DISPATCH_UNEXPECTED,
        `server '${descriptor.name}' has an invalid endpoint '${descriptor.endpoint}'`,
      );
    }
    if (endpoint.kind === "local") {
      const server = this.local.get(endpoint.id);
      if (!server) {
        throw new OrchestratorError(
          ERROR_CODES.DISPATCH_UNEXPECTED,
          `no local capability server is mounted as '${endpoint.id}'`,
          "enable CONDUCTOR_LOCAL_SERVERS or fix the endpoint",
          { server: descriptor.name, endpoint: descriptor.endpoint },
        );
      }
      return server;
    }
    const cached = this.remote.get(descriptor.name);
    if (cached && cached.endpoint === descriptor.endpoint) {
      return cached.transport;
    }
    if (!this.remoteFactory) {
      throw new OrchestratorError(
        ERROR_CODES.DISPATCH_UNEXPECTED,
        `remote endpoints are not supported by this router (server '${descriptor.name}')`,
      );
    }
    if (cached) {
      this.closeQuietly(descriptor.name, cached.transport);
    }
    const transport = this.remoteFactory(descriptor);
    this.remote.set(descriptor.name, { endpoint: descriptor.endpoint, transport });
    return transport;
  }

  async closeAll(): Promise<void> {
    const pending = Array.from(this.remote.values(), ({ transport }) => transport.close?.());
    this.remote.clear();
    await Promise.all(pending);
  }

  private closeQuietly(server: string, transport: CapabilityTransport): void {
    transport.close?.().catch((error: unknown) => {
      this.logger?.warn("transport_close_failed", { server, error });
    });
  }
}
