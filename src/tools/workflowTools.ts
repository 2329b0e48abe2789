import { z } from "zod";

import type { DispatchCoordinator } from "../dispatch/coordinator.js";
import { describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { ServerRegistry } from "../registry/serverRegistry.js";
import { runCaptureInsight } from "../workflow/captureInsight.js";
import type { WorkflowCoordinator } from "../workflow/coordinator.js";

export interface WorkflowToolContext {
  coordinator: DispatchCoordinator;
  workflows: WorkflowCoordinator;
  logger: StructuredLogger;
}

export const CaptureInsightInputSchema = z
  .object({
    title: z.string().min(1).max(512),
    insight: z.string().min(1).max(20_000),
    tags: z.array(z.string().min(1).max(128)).max(64).default([]),
    corpusNames: z.array(z.string().min(1).max(256)).max(32).default([]),
    userTriggered: z.boolean().default(false),
    entities: z.array(z.string().min(1).max(256)).max(100).default([]),
    relations: z
      .array(
        z
          .object({
            from: z.string().min(1).max(256),
            to: z.string().min(1).max(256),
            relationType: z.string().min(1).max(128),
          })
          .strict(),
      )
      .max(200)
      .default([]),
  })
  .strict();
export const CaptureInsightInputShape = CaptureInsightInputSchema.shape;

export interface CaptureInsightResult {
  workflow: string;
  completed: number[];
  results: Record<string, unknown>;
  continuedFailures: Array<{ index: number; step: string; message: string }>;
}

/** Runs the insight capture. A fatal step failure propagates as `PartialWorkflowFailure`. */
export async function handleCaptureInsight(
  context: WorkflowToolContext,
  input: z.infer<typeof CaptureInsightInputSchema>,
  signal?: AbortSignal,
): Promise<CaptureInsightResult> {
  const report = await runCaptureInsight(context.workflows, context.coordinator, input, signal);
  return {
    workflow: report.workflow,
    completed: report.completed,
    results: Object.fromEntries(report.results),
    continuedFailures: report.continuedFailures.map((failure) => ({
      index: failure.index,
      step: failure.step,
      message: describeError(failure.error),
    })),
  };
}

export const ServerStatusInputSchema = z.object({}).strict();
export const ServerStatusInputShape = ServerStatusInputSchema.shape;

export interface ServerStatusEntry {
  name: string;
  endpoint: string;
  auth: string;
  health: string;
  consecutiveFailures: number;
  lastFailureAt: string | null;
  capabilities: string[];
  allowedDirectories: string[];
}

/** Health view of the registry. Credentials never leave the registry. */
export function handleServerStatus(registry: ServerRegistry): { servers: ServerStatusEntry[] } {
  return {
    servers: registry.list().map((descriptor) => ({
      name: descriptor.name,
      endpoint: descriptor.endpoint,
      auth: descriptor.auth.type,
      health: descriptor.health,
      consecutiveFailures: descriptor.consecutiveFailures,
      lastFailureAt: descriptor.lastFailureAt === null ? null : new Date(descriptor.lastFailureAt).toISOString(),
      capabilities: [...descriptor.capabilities].sort(),
      allowedDirectories: descriptor.allowedDirectories,
    })),
  };
}
