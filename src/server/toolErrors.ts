import { z } from "zod";

import { DispatchFailure, isTransientError } from "../dispatch/errors.js";
import { describeError, OrchestratorError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import { ERROR_CODES, normaliseErrorHint, normaliseErrorMessage } from "../types.js";
import { omitUndefinedEntries } from "../utils/object.js";

/**
 * Structured payload returned by tool handlers when an error occurs. The MCP
 * transport expects the `content` array to contain textual JSON so downstream
 * clients can parse the code, hint and optional details.
 */
export interface ToolErrorResponse {
  [key: string]: unknown;
  isError: true;
  content: Array<{ type: "text"; text: string }>;
}

/** Normalised representation of a thrown error. */
export interface NormalisedToolError {
  code: string;
  message: string;
  hint?: string;
  details?: unknown;
}

/** Codes applied to errors that do not carry their own. */
export interface ToolErrorCodes {
  defaultCode: string;
  invalidInputCode?: string;
}

export const MEMORY_ERROR_CODES: ToolErrorCodes = {
  defaultCode: ERROR_CODES.MEMORY_UNEXPECTED,
  invalidInputCode: ERROR_CODES.MEMORY_INVALID_INPUT,
};

export const GRAPH_ERROR_CODES: ToolErrorCodes = {
  defaultCode: ERROR_CODES.GRAPH_UNEXPECTED,
  invalidInputCode: ERROR_CODES.GRAPH_INVALID_INPUT,
};

export const THINK_ERROR_CODES: ToolErrorCodes = {
  defaultCode: ERROR_CODES.THINK_UNEXPECTED,
  invalidInputCode: ERROR_CODES.THINK_INVALID_INPUT,
};

export const WORKFLOW_ERROR_CODES: ToolErrorCodes = {
  defaultCode: ERROR_CODES.WORKFLOW_UNEXPECTED,
  invalidInputCode: ERROR_CODES.WORKFLOW_INVALID_INPUT,
};

export const DISPATCH_ERROR_CODES: ToolErrorCodes = {
  defaultCode: ERROR_CODES.DISPATCH_UNEXPECTED,
  invalidInputCode: ERROR_CODES.DISPATCH_INVALID_INPUT,
};

function serialise(payload: Record<string, unknown>): string {
  return JSON.stringify(payload, null, 2);
}

/**
 * Normalises an arbitrary error. Conductor errors keep their own code, hint
 * and details; zod failures map to the family's invalid-input code.
 */
export function normaliseToolError(error: unknown, codes: ToolErrorCodes): NormalisedToolError {
  let code = codes.defaultCode;
  let hint: string | undefined;
  let details: unknown;

  if (error instanceof z.ZodError) {
    code = codes.invalidInputCode ?? codes.defaultCode;
    hint = "invalid_input";
    details = { issues: error.issues };
  } else if (error instanceof OrchestratorError) {
    code = error.code;
    hint = error.hint;
    details = error.details;
  }

  return {
    code,
    message: normaliseErrorMessage(describeError(error)),
    ...omitUndefinedEntries({
      hint: normaliseErrorHint(hint),
      details,
    }),
  };
}

/**
 * A dispatch that failed because the capability server rejected the call
 * (missing record, dangling relation...) surfaces the server's own error,
 * annotated with where and how many attempts it took. Exhausted retries,
 * cancellations and short-circuits surface the dispatch failure itself.
 */
export function normaliseDispatchFailure(failure: DispatchFailure, codes: ToolErrorCodes): NormalisedToolError {
  const underlying = failure.lastError;
  const answeredByServer =
    !failure.cancelled &&
    !failure.shortCircuited &&
    underlying instanceof OrchestratorError &&
    !isTransientError(underlying);
  if (!answeredByServer) {
    return normaliseToolError(failure, DISPATCH_ERROR_CODES);
  }
  const normalised = normaliseToolError(underlying, codes);
  normalised.details = {
    ...underlying.details,
    server: failure.server,
    operation: failure.operation,
    attempts: failure.attempts,
  };
  return normalised;
}

function logAndWrap(
  logger: StructuredLogger,
  toolName: string,
  normalised: NormalisedToolError,
  context: Record<string, unknown>,
): ToolErrorResponse {
  logger.error(`${toolName}_failed`, {
    ...context,
    message: normalised.message,
    code: normalised.code,
    details: normalised.details,
  });

  const payload: Record<string, unknown> = {
    ok: false,
    error: normalised.code,
    tool: toolName,
    message: normalised.message,
  };
  if (normalised.hint) {
    payload.hint = normalised.hint;
  }
  if (normalised.details !== undefined) {
    payload.details = normalised.details;
  }

  return {
    isError: true,
    content: [{ type: "text", text: serialise(payload) }],
  };
}

/** Formats an error raised while serving a tool, using the tool family's codes. */
export function toolError(
  logger: StructuredLogger,
  toolName: string,
  error: unknown,
  codes: ToolErrorCodes,
  context: Record<string, unknown> = {},
): ToolErrorResponse {
  const normalised =
    error instanceof DispatchFailure ? normaliseDispatchFailure(error, codes) : normaliseToolError(error, codes);
  return logAndWrap(logger, toolName, normalised, context);
}
