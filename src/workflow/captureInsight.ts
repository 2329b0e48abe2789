import { z } from "zod";

import type { DispatchCoordinator, DispatchPolicy } from "../dispatch/coordinator.js";
import { dispatchStep, type WorkflowCoordinator, type WorkflowReport, type WorkflowStep } from "./coordinator.js";

export interface CaptureInsightRequest {
  title: string;
  insight: string;
  tags: string[];
  corpusNames: string[];
  userTriggered: boolean;
  /** Entities receiving the insight as an observation. They must already exist. */
  entities: string[];
  relations: Array<{ from: string; to: string; relationType: string }>;
}

export const CAPTURE_INSIGHT_STEPS = {
  storeMemory: "store_memory",
  recordObservations: "record_observations",
  relateEntities: "relate_entities",
} as const;

const StoredMemorySchema = z.object({ record: z.object({ id: z.string() }) });

/** Observation appended to each entity, pointing back at the stored memory. */
export function insightObservation(insight: string, memoryId: string): string {
  return `${insight} [memory:${memoryId}]`;
}

/**
 * Steps of the insight capture: store the memory (fatal), append it to every
 * referenced entity (fatal), then relate the entities (continue). Empty
 * entity or relation lists skip the corresponding step.
 */
export function captureInsightSteps(
  coordinator: DispatchCoordinator,
  request: CaptureInsightRequest,
  policy?: Omit<DispatchPolicy, "signal">,
): WorkflowStep[] {
  const steps: WorkflowStep[] = [
    dispatchStep(coordinator, {
      name: CAPTURE_INSIGHT_STEPS.storeMemory,
      mode: "fatal",
      target: { capability: true },
      operation: "createMemory",
      policy,
      payload: () => ({
        title: request.title,
        content: request.insight,
        tags: request.tags,
        corpusNames: request.corpusNames,
        userTriggered: request.userTriggered,
      }),
    }),
  ];
  if (request.entities.length > 0) {
    steps.push(
      dispatchStep(coordinator, {
        name: CAPTURE_INSIGHT_STEPS.recordObservations,
        mode: "fatal",
        target: { capability: true },
        operation: "addObservations",
        policy,
        payload: (results) => {
          const stored = StoredMemorySchema.parse(results.get(CAPTURE_INSIGHT_STEPS.storeMemory));
          const observation = insightObservation(request.insight, stored.record.id);
          return {
            observations: request.entities.map((entityName) => ({ entityName, contents: [observation] })),
          };
        },
      }),
    );
  }
  if (request.relations.length > 0) {
    steps.push(
      dispatchStep(coordinator, {
        name: CAPTURE_INSIGHT_STEPS.relateEntities,
        mode: "continue",
        target: { capability: true },
        operation: "createRelations",
        policy,
        payload: () => ({ relations: request.relations }),
      }),
    );
  }
  return steps;
}

export function runCaptureInsight(
  workflows: WorkflowCoordinator,
  coordinator: DispatchCoordinator,
  request: CaptureInsightRequest,
  signal?: AbortSignal,
): Promise<WorkflowReport> {
  return workflows.run("captureInsight", captureInsightSteps(coordinator, request), { signal });
}
