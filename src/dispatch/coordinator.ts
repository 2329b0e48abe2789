import { runWithDispatchContext } from "../infra/dispatchContext.js";
import { computeBackoffDelay, DEFAULT_BACKOFF } from "../infra/backoff.js";
import type { StructuredLogger } from "../logger.js";
import { assertPayloadWithinAllowList } from "../paths.js";
import { CapabilityUnsupportedError, type ServerDescriptor, type ServerRegistry } from "../registry/serverRegistry.js";
import { runtimeClearTimeout, runtimeSetTimeout, sleep, type TimeoutHandle } from "../runtime/timers.js";
import { omitUndefinedEntries } from "../utils/object.js";
import {
  DispatchCancelledError,
  DispatchFailure,
  type DispatchFailureDetails,
  DispatchTimeoutError,
  isTransientError,
  ServerUnreachableError,
} from "./errors.js";
import type { CapabilityTransport } from "./transport.js";

/** Where to reroute a call once its target is unreachable or out of retries. */
export type FallbackPolicy = "fail" | { server: string };

/** Per-call knobs. Unset fields use the coordinator defaults. */
export interface DispatchPolicy {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Fraction of the capped delay randomly removed (1 = full jitter). */
  jitterRatio?: number;
  attemptTimeoutMs?: number;
  fallback?: FallbackPolicy;
  /** Checked between attempts and during backoff, never mid-attempt. */
  signal?: AbortSignal;
}

export type DispatchDefaults = Required<Omit<DispatchPolicy, "signal" | "fallback">> & {
  /** Delay after the last failure before an unreachable server receives a probe. */
  probeIntervalMs: number;
};

export const DEFAULT_DISPATCH: Readonly<DispatchDefaults> = {
  maxAttempts: 3,
  baseDelayMs: DEFAULT_BACKOFF.baseDelayMs,
  maxDelayMs: DEFAULT_BACKOFF.maxDelayMs,
  jitterRatio: DEFAULT_BACKOFF.jitterRatio,
  attemptTimeoutMs: 30_000,
  probeIntervalMs: 30_000,
};

export interface DispatchSuccess {
  ok: true;
  server: string;
  operation: string;
  /** Untyped JSON answered by the capability server. */
  value: unknown;
  attempts: number;
  /** Server originally targeted when the call was rerouted by the fallback policy. */
  fallbackFrom?: string;
}

export interface DispatchRejection {
  ok: false;
  failure: DispatchFailure;
}

export type DispatchOutcome = DispatchSuccess | DispatchRejection;

/** Resolves the transport able to reach a registered server. */
export interface TransportResolver {
  resolve(descriptor: ServerDescriptor): CapabilityTransport;
}

export interface DispatchCoordinatorOptions {
  registry: ServerRegistry;
  transports: TransportResolver;
  logger?: StructuredLogger;
  defaults?: Partial<DispatchDefaults>;
  random?: () => number;
  now?: () => number;
}

/** Unwraps a dispatch outcome, throwing the {@link DispatchFailure} on rejection. */
export function unwrapDispatch(outcome: DispatchOutcome): unknown {
  if (!outcome.ok) {
    throw outcome.failure;
  }
  return outcome.value;
}

/**
 * Routes operations to capability servers. The coordinator is the only
 * component reporting outcomes to the registry and the only one retrying:
 * transient failures are retried with capped exponential backoff, anything
 * else is returned to the caller after the first attempt.
 */
export class DispatchCoordinator {
  private readonly registry: ServerRegistry;
  private readonly transports: TransportResolver;
  private readonly logger?: StructuredLogger;
  private readonly defaults: DispatchDefaults;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(options: DispatchCoordinatorOptions) {
    this.registry = options.registry;
    this.transports = options.transports;
    this.logger = options.logger;
    this.defaults = { ...DEFAULT_DISPATCH, ...omitUndefinedEntries({ ...options.defaults }) };
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => Date.now());
  }

  /** Effective defaults, exposed for diagnostics. */
  get settings(): Readonly<DispatchDefaults> {
    return this.defaults;
  }

  /**
   * Invokes `operation` on `serverName`. Registry errors reject the promise
   * before any attempt; every other failure is returned as a rejection
   * envelope.
   */
  async invoke(
    serverName: string,
    operation: string,
    payload: unknown,
    policy: DispatchPolicy = {},
  ): Promise<DispatchOutcome> {
    return this.dispatch(serverName, operation, payload, policy, null);
  }

  /**
   * Invokes `operation` on the healthiest server declaring it. When no
   * fallback is given, the next candidate (if any) becomes the fallback.
   */
  async invokeCapability(
    operation: string,
    payload: unknown,
    policy: DispatchPolicy = {},
  ): Promise<DispatchOutcome> {
    const [primary, secondary] = this.registry.findByCapability(operation);
    if (!primary) {
      throw new CapabilityUnsupportedError(null, operation);
    }
    const fallback = policy.fallback ?? (secondary ? { server: secondary.name } : "fail");
    return this.dispatch(primary.name, operation, payload, { ...policy, fallback }, null);
  }

  private async dispatch(
    serverName: string,
    operation: string,
    payload: unknown,
    policy: DispatchPolicy,
    fallbackFrom: string | null,
  ): Promise<DispatchOutcome> {
    const descriptor = this.registry.resolve(serverName, operation);

    try {
      assertPayloadWithinAllowList(descriptor.name, descriptor.allowedDirectories, payload);
    } catch (error) {
      this.logger?.warn("dispatch_rejected_path", { server: descriptor.name, operation, error });
      return this.reject({ server: descriptor.name, operation, attempts: 0, lastError: error });
    }

    let maxAttempts = Math.max(1, Math.trunc(policy.maxAttempts ?? this.defaults.maxAttempts));
    if (descriptor.health === "unreachable") {
      const probeAt = (descriptor.lastFailureAt ?? 0) + this.defaults.probeIntervalMs;
      if (this.now() < probeAt) {
        return this.shortCircuit(descriptor, operation, payload, policy, fallbackFrom, probeAt);
      }
      this.logger?.info("dispatch_probe", { server: descriptor.name, operation });
      maxAttempts = 1;
    }

    const timeoutMs = Math.max(1, policy.attemptTimeoutMs ?? this.defaults.attemptTimeoutMs);
    const backoff = {
      baseDelayMs: policy.baseDelayMs ?? this.defaults.baseDelayMs,
      maxDelayMs: policy.maxDelayMs ?? this.defaults.maxDelayMs,
      jitterRatio: policy.jitterRatio ?? this.defaults.jitterRatio,
    };

    let transport: CapabilityTransport;
    try {
      transport = this.transports.resolve(descriptor);
    } catch (error) {
      // No route to the server counts against its health like a refused connection.
      this.registry.reportOutcome(descriptor.name, false);
      this.logger?.warn("dispatch_unroutable", { server: descriptor.name, operation, error });
      return this.reject({ server: descriptor.name, operation, attempts: 1, lastError: error });
    }

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (policy.signal?.aborted) {
        return this.cancelled(descriptor.name, operation, attempt - 1, policy.signal);
      }
      try {
        const value = await runWithDispatchContext({ server: descriptor.name, operation, attempt }, () =>
          this.attemptOnce(transport, descriptor, operation, payload, timeoutMs),
        );
        this.registry.reportOutcome(descriptor.name, true);
        this.logger?.debug("dispatch_succeeded", { server: descriptor.name, operation, attempt });
        const success: DispatchSuccess = {
          ok: true,
          server: descriptor.name,
          operation,
          value,
          attempts: attempt,
        };
        if (fallbackFrom !== null) {
          success.fallbackFrom = fallbackFrom;
        }
        return success;
      } catch (error) {
        lastError = error;
        const transient = isTransientError(error);
        // A non-transient error means the server answered.
        this.registry.reportOutcome(descriptor.name, !transient);
        if (!transient) {
          this.logger?.warn("dispatch_failed", { server: descriptor.name, operation, attempt, error });
          return this.reject({ server: descriptor.name, operation, attempts: attempt, lastError: error });
        }
        if (attempt >= maxAttempts) {
          break;
        }
        const delayMs = computeBackoffDelay(attempt - 1, backoff, this.random);
        this.logger?.warn("dispatch_retry_scheduled", {
          server: descriptor.name,
          operation,
          attempt,
          delay_ms: delayMs,
          error,
        });
        try {
          await sleep(delayMs, policy.signal);
        } catch {
          return this.cancelled(descriptor.name, operation, attempt, policy.signal);
        }
      }
    }

    this.logger?.error("dispatch_exhausted", { server: descriptor.name, operation, attempts: maxAttempts, error: lastError });
    const rerouted = this.fallBack(descriptor, operation, payload, policy, fallbackFrom);
    if (rerouted) {
      return rerouted;
    }
    return this.reject({ server: descriptor.name, operation, attempts: maxAttempts, lastError });
  }

  private async attemptOnce(
    transport: CapabilityTransport,
    descriptor: ServerDescriptor,
    operation: string,
    payload: unknown,
    timeoutMs: number,
  ): Promise<unknown> {
    const controller = new AbortController();
    let handle: TimeoutHandle | undefined;
    const timeout = new Promise<never>((_, reject) => {
      handle = runtimeSetTimeout(() => {
        const error = new DispatchTimeoutError(descriptor.name, operation, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });
    try {
      return await Promise.race([
        transport.call({ server: descriptor, operation, payload, signal: controller.signal, timeoutMs }),
        timeout,
      ]);
    } finally {
      if (handle !== undefined) {
        runtimeClearTimeout(handle);
      }
    }
  }

  private async shortCircuit(
    descriptor: ServerDescriptor,
    operation: string,
    payload: unknown,
    policy: DispatchPolicy,
    fallbackFrom: string | null,
    probeAt: number,
  ): Promise<DispatchOutcome> {
    const rerouted = this.fallBack(descriptor, operation, payload, policy, fallbackFrom);
    if (rerouted) {
      return rerouted;
    }
    this.logger?.warn("dispatch_short_circuited", { server: descriptor.name, operation, probe_at: probeAt });
    return this.reject({
      server: descriptor.name,
      operation,
      attempts: 0,
      lastError: new ServerUnreachableError(descriptor.name, probeAt),
      shortCircuited: true,
    });
  }

  /**
   * Reroutes to the fallback server, or returns `null` when the policy has
   * none. A rerouted call never falls back again.
   */
  private fallBack(
    descriptor: ServerDescriptor,
    operation: string,
    payload: unknown,
    policy: DispatchPolicy,
    fallbackFrom: string | null,
  ): Promise<DispatchOutcome> | null {
    const fallback = policy.fallback ?? "fail";
    if (fallback === "fail" || fallbackFrom !== null || fallback.server === descriptor.name) {
      return null;
    }
    this.logger?.warn("dispatch_fallback", { server: descriptor.name, operation, fallback: fallback.server });
    return this.dispatch(fallback.server, operation, payload, { ...policy, fallback: "fail" }, descriptor.name);
  }

  private cancelled(server: string, operation: string, attempts: number, signal: AbortSignal | undefined): DispatchRejection {
    const reason = signal?.reason;
    const text = reason instanceof Error ? reason.message : typeof reason === "string" ? reason : null;
    this.logger?.info("dispatch_cancelled", { server, operation, attempts });
    return this.reject({
      server,
      operation,
      attempts,
      lastError: new DispatchCancelledError(server, operation, text),
      cancelled: true,
    });
  }

  private reject(details: DispatchFailureDetails): DispatchRejection {
    return { ok: false, failure: new DispatchFailure(details) };
  }
}
