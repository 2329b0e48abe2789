import { ERROR_CODES, type ErrorCode } from "./types.js";

/**
 * Base class for every error raised by the conductor. Subclasses expose a
 * stable `code`, an optional remediation `hint` and structured `details` so
 * the tool facade can render a precise diagnostic without re-deriving state.
 */
export class OrchestratorError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly hint?: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "OrchestratorError";
  }
}

/** Raised by store lookups when an identifier (record id, entity name) is absent. */
export class NotFoundError extends OrchestratorError {
  constructor(
    readonly kind: "memory" | "entity",
    readonly identifier: string,
  ) {
    super(
      kind === "memory" ? ERROR_CODES.MEMORY_NOT_FOUND : ERROR_CODES.GRAPH_NOT_FOUND,
      `${kind} '${identifier}' does not exist`,
      kind === "memory" ? "search memories to obtain a valid id" : "create the entity before referencing it",
      { kind, identifier },
    );
    this.name = "NotFoundError";
  }
}

/**
 * Raised when a payload is well-formed but semantically invalid (for example
 * merging a record with itself). Validation failures are never retried.
 */
export class InvalidInputError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, "invalid_input", details);
    this.name = "InvalidInputError";
  }
}

/** Extracts a printable message from an arbitrary thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
