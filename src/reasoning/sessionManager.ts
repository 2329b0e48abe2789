import { KeyedMutex } from "../infra/keyedMutex.js";
import type { StructuredLogger } from "../logger.js";
import {
  ThoughtCapacityExceededError,
  ThoughtSession,
  type BranchKey,
  type ThoughtAcknowledgement,
  type ThoughtNode,
  type ThoughtSubmission,
} from "./thoughtSession.js";

export const DEFAULT_SESSION_ID = "default";

export interface SequentialReasoningEngineOptions {
  maxSessions?: number;
  maxThoughtsPerSession?: number;
  now?: () => number;
  logger?: StructuredLogger;
}

/**
 * Owns the reasoning sessions. Submissions to one session are processed in
 * arrival order; distinct sessions share nothing and interleave freely. When
 * the session cap is reached the least recently used idle session is evicted.
 */
export class SequentialReasoningEngine {
  /** Insertion order doubles as recency order: touched sessions are re-inserted. */
  private readonly sessions = new Map<string, ThoughtSession>();
  private readonly busy = new Map<string, number>();
  private readonly mutex = new KeyedMutex();
  private readonly maxSessions: number;
  private readonly maxThoughtsPerSession: number;
  private readonly now: () => number;
  private readonly logger?: StructuredLogger;

  constructor(options: SequentialReasoningEngineOptions = {}) {
    this.maxSessions = Math.max(1, options.maxSessions ?? 100);
    this.maxThoughtsPerSession = Math.max(1, options.maxThoughtsPerSession ?? 1_000);
    this.now = options.now ?? (() => Date.now());
    this.logger = options.logger;
  }

  async submit(sessionId: string, submission: ThoughtSubmission): Promise<ThoughtAcknowledgement> {
    this.busy.set(sessionId, (this.busy.get(sessionId) ?? 0) + 1);
    try {
      return await this.mutex.runExclusive(sessionId, () => {
        const session = this.acquire(sessionId);
        const ack = session.submit(submission);
        this.logger?.debug("thought_recorded", {
          session: sessionId,
          branch: ack.branchId,
          sequence: ack.sequenceNumber,
          renumbered: ack.renumbered,
        });
        return ack;
      });
    } finally {
      const pending = (this.busy.get(sessionId) ?? 1) - 1;
      if (pending <= 0) {
        this.busy.delete(sessionId);
      } else {
        this.busy.set(sessionId, pending);
      }
    }
  }

  history(sessionId: string, branchId?: BranchKey): ThoughtNode[] {
    return this.sessions.get(sessionId)?.history(branchId) ?? [];
  }

  lineage(sessionId: string, branchId: BranchKey): ThoughtNode[] {
    return this.sessions.get(sessionId)?.lineage(branchId) ?? [];
  }

  knownBranches(sessionId: string): string[] {
    return this.sessions.get(sessionId)?.knownBranches() ?? [];
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  sessionCount(): number {
    return this.sessions.size;
  }

  /** Destroys the session. Returns whether it existed. */
  closeSession(sessionId: string): boolean {
    const closed = this.sessions.delete(sessionId);
    if (closed) {
      this.logger?.info("thought_session_closed", { session: sessionId });
    }
    return closed;
  }

  /** Destroys every session. */
  reset(): void {
    const count = this.sessions.size;
    this.sessions.clear();
    this.logger?.info("thought_sessions_reset", { sessions: count });
  }

  private acquire(sessionId: string): ThoughtSession {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      this.sessions.delete(sessionId);
      this.sessions.set(sessionId, existing);
      return existing;
    }
    if (this.sessions.size >= this.maxSessions) {
      this.evictIdle(sessionId);
    }
    const session = new ThoughtSession(sessionId, this.maxThoughtsPerSession, this.now);
    this.sessions.set(sessionId, session);
    return session;
  }

  private evictIdle(requester: string): void {
    for (const candidate of this.sessions.keys()) {
      if (candidate !== requester && !this.busy.has(candidate)) {
        this.sessions.delete(candidate);
        this.logger?.warn("thought_session_evicted", { session: candidate, max_sessions: this.maxSessions });
        return;
      }
    }
    throw new ThoughtCapacityExceededError("sessions", this.maxSessions);
  }
}
