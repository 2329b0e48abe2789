/**
 * Helpers shared by the tool modules: input parsing for capability handlers
 * and the MCP success envelope.
 */
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";

import { InvalidInputError } from "../errors.js";
import type { ErrorCode } from "../types.js";

/** Structured payload type surfaced by MCP tool responses. */
type ToolStructuredContent = NonNullable<CallToolResult["structuredContent"]>;

/**
 * Validates a capability payload. Failures become {@link InvalidInputError}
 * so the dispatch coordinator treats them as final.
 */
export function parseToolInput<S extends z.ZodTypeAny>(schema: S, payload: unknown, code: ErrorCode): z.output<S> {
  const parsed = schema.safeParse(payload ?? {});
  if (!parsed.success) {
    throw new InvalidInputError(code, "invalid tool arguments", { issues: parsed.error.issues });
  }
  return parsed.data;
}

/** Wraps a dispatch value so it can travel as `structuredContent`. */
export function toStructuredContent(value: unknown): ToolStructuredContent {
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return { value };
}

/**
 * Builds a successful `CallToolResult`: the JSON text mirrors the structured
 * payload for clients that only read `content`.
 */
export function buildToolSuccessResult<TStructured extends ToolStructuredContent>(
  tool: string,
  structured: TStructured,
): CallToolResult & { structuredContent: TStructured } {
  return {
    isError: false,
    content: [{ type: "text", text: JSON.stringify({ tool, result: structured }) }],
    structuredContent: structured,
  };
}
