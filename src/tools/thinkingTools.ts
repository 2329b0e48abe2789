import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { DEFAULT_SESSION_ID, type SequentialReasoningEngine } from "../reasoning/sessionManager.js";
import type { ThoughtAcknowledgement } from "../reasoning/thoughtSession.js";

export interface ThinkingToolContext {
  engine: SequentialReasoningEngine;
  logger: StructuredLogger;
}

const BranchIdSchema = z.string().min(1).max(128);

export const SequentialThinkingInputSchema = z
  .object({
    thought: z.string().min(1, "thought must not be empty").max(20_000),
    thoughtNumber: z.number().int().min(1),
    totalThoughts: z.number().int().min(1),
    nextThoughtNeeded: z.boolean(),
    branchFromThought: z.number().int().min(1).optional(),
    branchId: BranchIdSchema.optional(),
    /** `null` forks from the trunk regardless of the session's current branch. */
    parentBranchId: BranchIdSchema.nullable().optional(),
    isRevision: z.boolean().optional(),
    revisesThought: z.number().int().min(1).optional(),
    sessionId: z.string().min(1).max(128).default(DEFAULT_SESSION_ID),
  })
  .strict();
export const SequentialThinkingInputShape = SequentialThinkingInputSchema.shape;

export interface SequentialThinkingResult extends ThoughtAcknowledgement {
  sessionId: string;
}

export async function handleSequentialThinking(
  context: ThinkingToolContext,
  input: z.infer<typeof SequentialThinkingInputSchema>,
): Promise<SequentialThinkingResult> {
  const { sessionId, ...submission } = input;
  const ack = await context.engine.submit(sessionId, submission);
  context.logger.info("sequential_thinking", {
    session: sessionId,
    branch: ack.branchId,
    sequence: ack.sequenceNumber,
    more_needed: ack.moreNeeded,
    branches: ack.knownBranches.length,
  });
  return { sessionId, ...ack };
}

export const CloseThinkingSessionInputSchema = z
  .object({
    sessionId: z.string().min(1).max(128).default(DEFAULT_SESSION_ID),
  })
  .strict();
export const CloseThinkingSessionInputShape = CloseThinkingSessionInputSchema.shape;

export interface CloseThinkingSessionResult {
  sessionId: string;
  /** `false` when no session existed under that identifier. */
  closed: boolean;
}

export function handleCloseThinkingSession(
  context: ThinkingToolContext,
  input: z.infer<typeof CloseThinkingSessionInputSchema>,
): CloseThinkingSessionResult {
  return { sessionId: input.sessionId, closed: context.engine.closeSession(input.sessionId) };
}
