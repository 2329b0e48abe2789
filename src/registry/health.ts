/**
 * Health state machine gating dispatches to capability servers. The machine is
 * a pure transition function over an explicit table so the flap-prevention
 * rule (recovery climbs one step per success) can be audited and tested in
 * isolation from the registry and the dispatch coordinator.
 */
export type HealthState = "healthy" | "degraded" | "unreachable";

/** Ordered from best to worst; used for ranking candidate servers. */
export const HEALTH_STATES: readonly HealthState[] = ["healthy", "degraded", "unreachable"];

/** Consecutive failures needed before a server drops one health step. */
export const DEFAULT_FAILURE_THRESHOLD = 3;

/** Outcome recorded for one dispatch attempt. */
export type AttemptOutcome = "success" | "failure";

/** Health bookkeeping carried by a server descriptor. */
export interface HealthSnapshot {
  state: HealthState;
  consecutiveFailures: number;
}

interface HealthTransition {
  /** State entered once the failure streak reaches the threshold. */
  onFailureStreak: HealthState;
  /** State entered after a single success. */
  onSuccess: HealthState;
}

const TRANSITIONS: Readonly<Record<HealthState, HealthTransition>> = {
  healthy: { onFailureStreak: "degraded", onSuccess: "healthy" },
  degraded: { onFailureStreak: "unreachable", onSuccess: "healthy" },
  unreachable: { onFailureStreak: "unreachable", onSuccess: "degraded" },
};

/**
 * Applies an attempt outcome. A failure extends the streak and, once the
 * streak reaches `threshold`, moves one step down and restarts the count so a
 * further full streak is needed for the next step. A success clears the
 * streak and moves one step up.
 */
export function applyOutcome(
  current: HealthSnapshot,
  outcome: AttemptOutcome,
  threshold: number = DEFAULT_FAILURE_THRESHOLD,
): HealthSnapshot {
  const transition = TRANSITIONS[current.state];
  if (outcome === "success") {
    return { state: transition.onSuccess, consecutiveFailures: 0 };
  }
  const streak = current.consecutiveFailures + 1;
  if (streak >= threshold && current.state !== "unreachable") {
    return { state: transition.onFailureStreak, consecutiveFailures: 0 };
  }
  return { state: current.state, consecutiveFailures: streak };
}

/** Sorting rank: lower is healthier. */
export function healthRank(state: HealthState): number {
  return HEALTH_STATES.indexOf(state);
}
