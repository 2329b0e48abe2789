/**
 * Exponential backoff used between dispatch attempts. The delay doubles with
 * every retry (`baseDelayMs × 2^retry`), is capped at `maxDelayMs`, then
 * jittered downwards by up to `jitterRatio` of its value so concurrent callers
 * retrying the same server spread out.
 */
export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction (0-1) of the capped delay that may be shaved off randomly. */
  jitterRatio: number;
}

export const DEFAULT_BACKOFF: Readonly<BackoffOptions> = {
  baseDelayMs: 100,
  maxDelayMs: 5_000,
  jitterRatio: 1,
};

/**
 * Returns the delay (milliseconds) to wait before retry number `retry`
 * (0 for the first retry). `random` must return a value in [0, 1).
 */
export function computeBackoffDelay(
  retry: number,
  options: BackoffOptions = DEFAULT_BACKOFF,
  random: () => number = Math.random,
): number {
  const base = Math.max(0, options.baseDelayMs);
  const cap = Math.max(0, options.maxDelayMs);
  const exponential = base * 2 ** Math.max(0, retry);
  const capped = Math.min(cap, exponential);
  const ratio = Math.min(1, Math.max(0, options.jitterRatio));
  const jitter = capped * ratio * random();
  return Math.round(capped - jitter);
}
