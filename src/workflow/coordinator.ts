import { DispatchCancelledError, DispatchFailure } from "../dispatch/errors.js";
import { unwrapDispatch, type DispatchCoordinator, type DispatchPolicy } from "../dispatch/coordinator.js";
import { describeError, OrchestratorError } from "../errors.js";
import { runWithDispatchContext } from "../infra/dispatchContext.js";
import type { StructuredLogger } from "../logger.js";
import { ERROR_CODES } from "../types.js";

/** `fatal` steps halt the workflow on failure; `continue` steps are logged and skipped. */
export type StepMode = "fatal" | "continue";

export interface WorkflowStepContext {
  workflow: string;
  step: string;
  /** Values returned by the earlier successful steps, keyed by step name. */
  results: ReadonlyMap<string, unknown>;
  signal?: AbortSignal;
}

export interface WorkflowStep {
  name: string;
  mode: StepMode;
  run(context: WorkflowStepContext): Promise<unknown>;
}

export interface StepFailure {
  index: number;
  step: string;
  error: unknown;
}

export interface WorkflowReport {
  workflow: string;
  /** Indices of the steps that succeeded. */
  completed: number[];
  results: ReadonlyMap<string, unknown>;
  continuedFailures: StepFailure[];
}

export interface WorkflowRunOptions {
  signal?: AbortSignal;
}

/** Raised for a step that observed a cancellation. Always fatal. */
export class WorkflowCancelledError extends OrchestratorError {
  constructor(
    readonly workflow: string,
    readonly step: string,
    reason: string | null,
  ) {
    super(
      ERROR_CODES.WORKFLOW_CANCELLED,
      reason ? `workflow '${workflow}' cancelled at step '${step}': ${reason}` : `workflow '${workflow}' cancelled at step '${step}'`,
      "operation_cancelled",
      { workflow, step, reason },
    );
    this.name = "WorkflowCancelledError";
  }
}

/**
 * A fatal step failed. Steps that already completed are not undone; the
 * report lets the caller decide on compensation.
 */
export class PartialWorkflowFailure extends OrchestratorError {
  override readonly cause: unknown;

  constructor(
    readonly workflow: string,
    readonly completed: readonly number[],
    readonly completedSteps: readonly string[],
    readonly failedAt: number,
    readonly failedStep: string,
    cause: unknown,
    readonly continuedFailures: readonly StepFailure[],
    readonly results: ReadonlyMap<string, unknown>,
  ) {
    const underlying = cause instanceof OrchestratorError ? cause : null;
    super(
      ERROR_CODES.WORKFLOW_PARTIAL,
      `workflow '${workflow}' failed at step ${failedAt} (${failedStep}): ${describeError(cause)}`,
      "inspect completed steps before retrying",
      {
        workflow,
        completed: [...completed],
        completed_steps: [...completedSteps],
        failed_at: failedAt,
        failed_step: failedStep,
        cause: underlying
          ? { code: underlying.code, message: underlying.message, details: underlying.details ?? null }
          : { message: describeError(cause) },
        continued_failures: continuedFailures.map((failure) => ({
          index: failure.index,
          step: failure.step,
          message: describeError(failure.error),
        })),
      },
    );
    this.name = "PartialWorkflowFailure";
    this.cause = cause;
  }
}

function isCancellation(error: unknown): boolean {
  return (
    error instanceof WorkflowCancelledError ||
    error instanceof DispatchCancelledError ||
    (error instanceof DispatchFailure && error.cancelled)
  );
}

function abortReason(signal: AbortSignal): string | null {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.message;
  }
  return typeof reason === "string" ? reason : null;
}

/**
 * Runs steps in order. There is no rollback: cross-server changes are not
 * transactional, so a fatal failure is reported with what completed.
 */
export class WorkflowCoordinator {
  constructor(private readonly logger?: StructuredLogger) {}

  async run(workflow: string, steps: readonly WorkflowStep[], options: WorkflowRunOptions = {}): Promise<WorkflowReport> {
    const results = new Map<string, unknown>();
    const completed: number[] = [];
    const continuedFailures: StepFailure[] = [];
    const fail = (index: number, step: WorkflowStep, cause: unknown): PartialWorkflowFailure =>
      new PartialWorkflowFailure(
        workflow,
        [...completed],
        completed.map((position) => steps[position]?.name ?? String(position)),
        index,
        step.name,
        cause,
        [...continuedFailures],
        new Map(results),
      );

    for (const [index, step] of steps.entries()) {
      if (options.signal?.aborted) {
        const cancelled = new WorkflowCancelledError(workflow, step.name, abortReason(options.signal));
        this.logger?.warn("workflow_cancelled", { workflow, step: step.name, index });
        throw fail(index, step, cancelled);
      }
      try {
        const value = await runWithDispatchContext({ workflow, step: step.name }, () =>
          step.run({ workflow, step: step.name, results, signal: options.signal }),
        );
        results.set(step.name, value);
        completed.push(index);
        this.logger?.debug("workflow_step_completed", { workflow, step: step.name, index });
      } catch (error) {
        if (step.mode === "fatal" || isCancellation(error)) {
          this.logger?.error("workflow_step_failed", { workflow, step: step.name, index, mode: step.mode, error });
          throw fail(index, step, error);
        }
        continuedFailures.push({ index, step: step.name, error });
        this.logger?.warn("workflow_step_failed", { workflow, step: step.name, index, mode: step.mode, error });
      }
    }

    this.logger?.info("workflow_completed", {
      workflow,
      steps: steps.length,
      continued_failures: continuedFailures.length,
    });
    return { workflow, completed, results, continuedFailures };
  }
}

/** Target of a dispatch step: a named server, or the best server declaring the operation. */
export type DispatchTarget = { server: string } | { capability: true };

export interface DispatchStepDefinition {
  name: string;
  mode: StepMode;
  target: DispatchTarget;
  operation: string;
  payload: (results: ReadonlyMap<string, unknown>) => unknown;
  policy?: Omit<DispatchPolicy, "signal">;
}

/** Builds a step invoking the dispatch coordinator, forwarding the workflow signal. */
export function dispatchStep(coordinator: DispatchCoordinator, definition: DispatchStepDefinition): WorkflowStep {
  return {
    name: definition.name,
    mode: definition.mode,
    async run(context) {
      const policy: DispatchPolicy = { ...definition.policy, signal: context.signal };
      const payload = definition.payload(context.results);
      const outcome =
        "server" in definition.target
          ? await coordinator.invoke(definition.target.server, definition.operation, payload, policy)
          : await coordinator.invokeCapability(definition.operation, payload, policy);
      return unwrapDispatch(outcome);
    },
  };
}
