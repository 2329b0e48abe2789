import { Buffer } from "node:buffer";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { CallToolResultSchema, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";

import { describeError, InvalidInputError, OrchestratorError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { ServerAuth, ServerDescriptor } from "../registry/serverRegistry.js";
import { ERROR_CODES } from "../types.js";
import { parseEndpoint } from "./endpoint.js";
import { isTransientError, RemoteToolError, TransportConnectionError } from "./errors.js";
import type { CapabilityRequest, CapabilityTransport } from "./transport.js";

const CLIENT_INFO = { name: "mcp-conductor", version: "0.1.0" } as const;

/**
 * Capability transport backed by an MCP {@link Client}. Operations map to
 * tool names and payloads to tool arguments. The connection is opened on the
 * first call and re-opened after a transport-level failure.
 */
export class McpClientTransport implements CapabilityTransport {
  private client: Client | null = null;
  private connecting: Promise<Client> | null = null;

  constructor(
    private readonly server: string,
    private readonly createTransport: () => Transport,
    private readonly logger?: StructuredLogger,
  ) {}

  async call(request: CapabilityRequest): Promise<unknown> {
    const args = toToolArguments(request.payload);
    const client = await this.connect();
    let raw: unknown;
    try {
      raw = await client.callTool({ name: request.operation, arguments: args }, undefined, {
        signal: request.signal,
        timeout: request.timeoutMs,
      });
    } catch (error) {
      if (isTransientError(error)) {
        await this.disconnect(client);
      }
      throw error;
    }
    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RemoteToolError(this.server, request.operation, "malformed tool result");
    }
    if (parsed.data.isError) {
      throw new RemoteToolError(this.server, request.operation, extractText(parsed.data));
    }
    return parsed.data.structuredContent ?? { content: parsed.data.content };
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      await client.close();
    }
  }

  private connect(): Promise<Client> {
    if (this.client) {
      return Promise.resolve(this.client);
    }
    if (!this.connecting) {
      this.connecting = this.open().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async open(): Promise<Client> {
    const client = new Client(CLIENT_INFO);
    try {
      await client.connect(this.createTransport());
    } catch (error) {
      throw new TransportConnectionError(this.server, describeError(error));
    }
    client.onclose = () => {
      if (this.client === client) {
        this.client = null;
        this.logger?.warn("mcp_client_closed", { server: this.server });
      }
    };
    this.client = client;
    this.logger?.info("mcp_client_connected", { server: this.server });
    return client;
  }

  private async disconnect(client: Client): Promise<void> {
    if (this.client !== client) {
      return;
    }
    this.client = null;
    try {
      await client.close();
    } catch (error) {
      this.logger?.warn("mcp_client_close_failed", { server: this.server, error });
    }
  }
}

function toToolArguments(payload: unknown): Record<string, unknown> {
  if (payload === undefined || payload === null) {
    return {};
  }
  if (typeof payload !== "object" || Array.isArray(payload)) {
    throw new InvalidInputError(ERROR_CODES.DISPATCH_INVALID_INPUT, "tool arguments must be an object");
  }
  return Object.fromEntries(Object.entries(payload));
}

function extractText(result: CallToolResult): string {
  const text = result.content
    .flatMap((item) => (item.type === "text" ? [item.text] : []))
    .join("\n")
    .trim();
  return text.length > 0 ? text : "remote tool reported an error";
}

/** Builds the `Authorization` header carried by HTTP requests. */
export function authorizationHeader(auth: ServerAuth): string | null {
  switch (auth.type) {
    case "none":
      return null;
    case "basic":
      return `Basic ${Buffer.from(`${auth.username}:${auth.password}`, "utf8").toString("base64")}`;
    case "bearer":
      return `Bearer ${auth.token}`;
  }
}

/** Default factory for `stdio:` and `http(s)://` descriptors. */
export function createMcpTransport(descriptor: ServerDescriptor, logger?: StructuredLogger): McpClientTransport {
  const endpoint = parseEndpoint(descriptor.endpoint);
  if (!endpoint || endpoint.kind === "local") {
    throw new OrchestratorError(
      ERROR_CODES.DISPATCH_UNEXPECTED,
      `server '${descriptor.name}' is not reachable over MCP (endpoint '${descriptor.endpoint}')`,
    );
  }
  if (endpoint.kind === "stdio") {
    return new McpClientTransport(
      descriptor.name,
      () => new StdioClientTransport({ command: endpoint.command, args: endpoint.args, stderr: "inherit" }),
      logger,
    );
  }
  const authorization = authorizationHeader(descriptor.auth);
  const headers: Record<string, string> = authorization ? { Authorization: authorization } : {};
  return new McpClientTransport(
    descriptor.name,
    () => new StreamableHTTPClientTransport(endpoint.url, { requestInit: { headers } }),
    logger,
  );
}
