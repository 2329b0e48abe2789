import { McpError, ErrorCode as McpErrorCode } from "@modelcontextprotocol/sdk/types.js";

import { describeError, OrchestratorError } from "../errors.js";
import { ERROR_CODES } from "../types.js";

/** Socket and DNS error codes that indicate a transient outage. */
const TRANSIENT_ERRNO_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
]);

/** Raised when a single attempt exceeds the per-attempt timeout. */
export class DispatchTimeoutError extends OrchestratorError {
  readonly transient = true;

  constructor(
    readonly server: string,
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(
      ERROR_CODES.DISPATCH_TIMEOUT,
      `${server}.${operation} timed out after ${timeoutMs}ms`,
      "raise attemptTimeoutMs or check the server",
      { server, operation, timeoutMs },
    );
    this.name = "DispatchTimeoutError";
  }
}

/** Raised when the caller aborts a dispatch between two attempts. */
export class DispatchCancelledError extends OrchestratorError {
  constructor(
    readonly server: string,
    readonly operation: string,
    readonly reason: string | null,
  ) {
    super(
      ERROR_CODES.DISPATCH_CANCELLED,
      reason ? `${server}.${operation} cancelled: ${reason}` : `${server}.${operation} cancelled`,
      "operation_cancelled",
      { server, operation, reason },
    );
    this.name = "DispatchCancelledError";
  }
}

/** Raised by transports when the server cannot be reached or the link dropped. */
export class TransportConnectionError extends OrchestratorError {
  readonly transient = true;

  constructor(
    readonly server: string,
    message: string,
  ) {
    super(ERROR_CODES.DISPATCH_CONNECTION, `cannot reach server '${server}': ${message}`, "check the server endpoint", {
      server,
    });
    this.name = "TransportConnectionError";
  }
}

/** The remote server answered the call with an error result. */
export class RemoteToolError extends OrchestratorError {
  constructor(
    readonly server: string,
    readonly operation: string,
    remoteMessage: string,
  ) {
    super(ERROR_CODES.DISPATCH_REMOTE, `${server}.${operation} failed: ${remoteMessage}`, undefined, {
      server,
      operation,
    });
    this.name = "RemoteToolError";
  }
}

/** Last error of a dispatch short-circuited on an unreachable server. */
export class ServerUnreachableError extends OrchestratorError {
  constructor(
    readonly server: string,
    readonly probeAt: number | null,
  ) {
    super(
      ERROR_CODES.DISPATCH_UNREACHABLE,
      `server '${server}' is unreachable`,
      "wait for the probe interval or configure a fallback",
      { server, probeAt },
    );
    this.name = "ServerUnreachableError";
  }
}

export interface DispatchFailureDetails {
  server: string;
  operation: string;
  attempts: number;
  lastError: unknown;
  cancelled?: boolean;
  shortCircuited?: boolean;
}

/**
 * Terminal failure of a dispatch: retries exhausted, a non-retryable error,
 * a cancellation or a short-circuit on an unreachable server.
 */
export class DispatchFailure extends OrchestratorError {
  readonly server: string;
  readonly operation: string;
  readonly attempts: number;
  readonly lastError: unknown;
  readonly cancelled: boolean;
  readonly shortCircuited: boolean;

  constructor(failure: DispatchFailureDetails) {
    const cancelled = failure.cancelled ?? false;
    const shortCircuited = failure.shortCircuited ?? false;
    const underlying = failure.lastError instanceof OrchestratorError ? failure.lastError : null;
    super(
      cancelled ? ERROR_CODES.DISPATCH_CANCELLED : ERROR_CODES.DISPATCH_FAILED,
      `${failure.server}.${failure.operation} failed after ${failure.attempts} attempt(s): ${describeError(failure.lastError)}`,
      underlying?.hint,
      {
        server: failure.server,
        operation: failure.operation,
        attempts: failure.attempts,
        cancelled,
        short_circuited: shortCircuited,
        cause: underlying
          ? { code: underlying.code, message: underlying.message, details: underlying.details ?? null }
          : { message: describeError(failure.lastError) },
      },
    );
    this.name = "DispatchFailure";
    this.server = failure.server;
    this.operation = failure.operation;
    this.attempts = failure.attempts;
    this.lastError = failure.lastError;
    this.cancelled = cancelled;
    this.shortCircuited = shortCircuited;
  }
}

/**
 * Only timeouts and connection-level failures are retried. Validation errors
 * and domain errors returned by a live server are final.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof DispatchTimeoutError || error instanceof TransportConnectionError) {
    return true;
  }
  if (error instanceof McpError) {
    return error.code === McpErrorCode.ConnectionClosed || error.code === McpErrorCode.RequestTimeout;
  }
  if (error instanceof Error) {
    if ("transient" in error && error.transient === true) {
      return true;
    }
    if ("code" in error && typeof error.code === "string") {
      return TRANSIENT_ERRNO_CODES.has(error.code);
    }
  }
  return false;
}
