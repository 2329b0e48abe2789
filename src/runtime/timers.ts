import {
  clearTimeout as nodeClearTimeout,
  setTimeout as nodeSetTimeout,
} from "node:timers";

/**
 * Handle returned by {@link runtimeSetTimeout}. Fake timers replace the
 * implementation at runtime but we retain the nominal Node shape.
 */
export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

const fallbackTimers = {
  setTimeout: nodeSetTimeout,
  clearTimeout: nodeClearTimeout,
} as const;

/**
 * Helper retrieving the timer function currently exposed by the runtime. When
 * Sinon installs fake timers the overrides live on {@link globalThis}; the
 * backoff sleeps of the dispatch coordinator must go through them so tests can
 * advance the clock deterministically.
 */
function resolveTimer<K extends keyof typeof fallbackTimers>(key: K): (typeof fallbackTimers)[K] {
  const candidate: unknown = Reflect.get(globalThis, key);
  if (typeof candidate === "function") {
    return candidate as (typeof fallbackTimers)[K];
  }
  return fallbackTimers[key];
}

/** Schedules a callback using the currently active timer implementation. */
export function runtimeSetTimeout(callback: () => void, ms: number): TimeoutHandle {
  return resolveTimer("setTimeout")(callback, ms);
}

/** Cancels a timeout using the runtime-aware implementation. */
export function runtimeClearTimeout(handle: TimeoutHandle): void {
  resolveTimer("clearTimeout")(handle);
}

/**
 * Resolves after `ms` milliseconds, or rejects with the signal's reason as
 * soon as the signal aborts. A zero delay still yields to the event loop.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      runtimeClearTimeout(handle);
      reject(signal?.reason);
    };
    const handle = runtimeSetTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
