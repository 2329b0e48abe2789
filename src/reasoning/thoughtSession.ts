import { InvalidInputError, OrchestratorError } from "../errors.js";
import { ERROR_CODES } from "../types.js";

/** Branch identifier; `null` designates the trunk. */
export type BranchKey = string | null;

/** One submitted reasoning step. */
export interface ThoughtSubmission {
  thought: string;
  thoughtNumber: number;
  totalThoughts: number;
  nextThoughtNeeded: boolean;
  branchFromThought?: number;
  branchId?: string;
  /** Branch the new branch forks from. Defaults to the session's current branch. */
  parentBranchId?: string | null;
  isRevision?: boolean;
  revisesThought?: number;
}

/** Node stored in the session arena. */
export interface ThoughtNode {
  readonly sequenceNumber: number;
  readonly branchId: BranchKey;
  readonly thought: string;
  readonly totalThoughts: number;
  readonly nextThoughtNeeded: boolean;
  readonly isRevision: boolean;
  readonly revisesThought: number | null;
  readonly branchFromThought: number | null;
  readonly recordedAt: number;
}

export interface ThoughtAcknowledgement {
  sequenceNumber: number;
  branchId: BranchKey;
  /** `nextThoughtNeeded`, or the sequence is still below the branch hint. */
  moreNeeded: boolean;
  knownBranches: string[];
  totalThoughts: number;
  branchComplete: boolean;
  historyLength: number;
  /** The supplied thought number was not past the branch tail and was replaced. */
  renumbered: boolean;
}

export class InvalidBranchOriginError extends OrchestratorError {
  constructor(
    readonly branchId: string,
    readonly branchFromThought: number | null,
    reason: string,
  ) {
    super(ERROR_CODES.THINK_INVALID_BRANCH_ORIGIN, `cannot open branch '${branchId}': ${reason}`, "branch from a thought visible in the parent branch", {
      branchId,
      branchFromThought,
    });
    this.name = "InvalidBranchOriginError";
  }
}

export class InvalidRevisionTargetError extends OrchestratorError {
  constructor(
    readonly revisesThought: number | null,
    readonly branchId: BranchKey,
  ) {
    super(
      ERROR_CODES.THINK_INVALID_REVISION_TARGET,
      revisesThought === null
        ? "a revision must name the thought it revises"
        : `thought ${revisesThought} does not exist in the lineage of ${branchLabel(branchId)}`,
      "revise a thought visible from the branch",
      { revisesThought, branchId },
    );
    this.name = "InvalidRevisionTargetError";
  }
}

export class ThoughtCapacityExceededError extends OrchestratorError {
  constructor(
    readonly resource: "thoughts" | "sessions",
    readonly limit: number,
  ) {
    super(
      ERROR_CODES.THINK_CAPACITY,
      resource === "thoughts" ? `session holds the maximum of ${limit} thoughts` : `all ${limit} sessions are busy`,
      resource === "thoughts" ? "close the session or start a new one" : "retry once a session is idle",
      { resource, limit },
    );
    this.name = "ThoughtCapacityExceededError";
  }
}

export function branchLabel(branchId: BranchKey): string {
  return branchId === null ? "the trunk" : `branch '${branchId}'`;
}

interface BranchState {
  readonly id: BranchKey;
  readonly parent: BranchKey;
  /** Sequence in the parent lineage the branch forks from; 0 for the trunk. */
  readonly originSequence: number;
  /** Branch-local sequence numbers, ascending. */
  readonly sequences: number[];
  totalThoughts: number;
  complete: boolean;
}

function nodeKey(branchId: BranchKey, sequence: number): string {
  return `${branchId ?? ""}#${sequence}`;
}

/**
 * Reasoning state of one session: an arena of nodes keyed by
 * (branch, sequence) and a branch directory holding origins as
 * back-references. Branch-local nodes are invisible to sibling branches;
 * ancestor nodes up to the fork point are visible to descendants.
 */
export class ThoughtSession {
  private readonly arena = new Map<string, ThoughtNode>();
  private readonly branches = new Map<BranchKey, BranchState>();
  /** Arena keys in submission order. */
  private readonly order: string[] = [];
  private readonly trunk: BranchState = { id: null, parent: null, originSequence: 0, sequences: [], totalThoughts: 0, complete: false };
  private currentBranch: BranchKey = null;

  constructor(
    readonly id: string,
    private readonly maxThoughts: number,
    private readonly now: () => number = () => Date.now(),
  ) {
    this.branches.set(null, this.trunk);
  }

  get size(): number {
    return this.arena.size;
  }

  knownBranches(): string[] {
    return Array.from(this.branches.keys()).filter((key): key is string => key !== null);
  }

  submit(submission: ThoughtSubmission): ThoughtAcknowledgement {
    assertPositiveInt("thoughtNumber", submission.thoughtNumber);
    assertPositiveInt("totalThoughts", submission.totalThoughts);

    const branchId: BranchKey = submission.branchId ?? null;
    const existing = this.branches.get(branchId);
    const branch = existing ?? (branchId === null ? this.trunk : this.prepareBranch(branchId, submission));

    const isRevision = submission.isRevision ?? submission.revisesThought !== undefined;
    if (isRevision || submission.revisesThought !== undefined) {
      const target = submission.revisesThought ?? null;
      if (target === null || !this.visibleSequences(branch).includes(target)) {
        throw new InvalidRevisionTargetError(target, branchId);
      }
    }

    if (this.arena.size >= this.maxThoughts) {
      throw new ThoughtCapacityExceededError("thoughts", this.maxThoughts);
    }

    const floor = branch.sequences.at(-1) ?? branch.originSequence;
    const sequenceNumber = submission.thoughtNumber > floor ? submission.thoughtNumber : floor + 1;

    if (!existing) {
      this.branches.set(branchId, branch);
    }
    const node: ThoughtNode = Object.freeze({
      sequenceNumber,
      branchId,
      thought: submission.thought,
      totalThoughts: submission.totalThoughts,
      nextThoughtNeeded: submission.nextThoughtNeeded,
      isRevision,
      revisesThought: submission.revisesThought ?? null,
      branchFromThought: submission.branchFromThought ?? null,
      recordedAt: this.now(),
    });
    const key = nodeKey(branchId, sequenceNumber);
    this.arena.set(key, node);
    this.order.push(key);
    branch.sequences.push(sequenceNumber);
    branch.totalThoughts = Math.max(branch.totalThoughts, submission.totalThoughts);
    // Terminal submissions close the branch; any later one reopens it.
    branch.complete = !submission.nextThoughtNeeded && sequenceNumber >= branch.totalThoughts;
    this.currentBranch = branchId;

    return {
      sequenceNumber,
      branchId,
      moreNeeded: submission.nextThoughtNeeded || sequenceNumber < branch.totalThoughts,
      knownBranches: this.knownBranches(),
      totalThoughts: branch.totalThoughts,
      branchComplete: branch.complete,
      historyLength: this.arena.size,
      renumbered: sequenceNumber !== submission.thoughtNumber,
    };
  }

  /** Nodes in submission order, optionally restricted to one branch's own nodes. */
  history(branchId?: BranchKey): ThoughtNode[] {
    const nodes = this.order.flatMap((key) => {
      const node = this.arena.get(key);
      return node ? [node] : [];
    });
    return branchId === undefined ? nodes : nodes.filter((node) => node.branchId === branchId);
  }

  /** Nodes visible from the branch: inherited ancestors up to each fork point, then its own. */
  lineage(branchId: BranchKey): ThoughtNode[] {
    const branch = this.branches.get(branchId);
    if (!branch) {
      return [];
    }
    return this.visibleKeys(branch).flatMap((key) => {
      const node = this.arena.get(key);
      return node ? [node] : [];
    });
  }

  private prepareBranch(branchId: string, submission: ThoughtSubmission): BranchState {
    const parentKey: BranchKey = submission.parentBranchId === undefined ? this.currentBranch : submission.parentBranchId;
    const parent = this.branches.get(parentKey);
    if (!parent) {
      throw new InvalidBranchOriginError(branchId, submission.branchFromThought ?? null, `unknown parent ${branchLabel(parentKey)}`);
    }
    const origin = submission.branchFromThought;
    if (origin === undefined) {
      throw new InvalidBranchOriginError(branchId, null, "branchFromThought is required for a new branch");
    }
    if (!this.visibleSequences(parent).includes(origin)) {
      throw new InvalidBranchOriginError(branchId, origin, `thought ${origin} does not exist in ${branchLabel(parentKey)}`);
    }
    return { id: branchId, parent: parentKey, originSequence: origin, sequences: [], totalThoughts: 0, complete: false };
  }

  private visibleSequences(branch: BranchState): number[] {
    return this.visibleKeys(branch).flatMap((key) => {
      const node = this.arena.get(key);
      return node ? [node.sequenceNumber] : [];
    });
  }

  /** Sequences along a lineage strictly increase, so the fork point bounds the inherited part. */
  private visibleKeys(branch: BranchState): string[] {
    const own = branch.sequences.map((sequence) => nodeKey(branch.id, sequence));
    if (branch.id === null) {
      return own;
    }
    const parent = this.branches.get(branch.parent);
    if (!parent) {
      return own;
    }
    const inherited = this.visibleKeys(parent).filter((key) => {
      const node = this.arena.get(key);
      return node !== undefined && node.sequenceNumber <= branch.originSequence;
    });
    return [...inherited, ...own];
  }
}

function assertPositiveInt(field: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new InvalidInputError(ERROR_CODES.THINK_INVALID_INPUT, `${field} must be a positive integer`, { field, value });
  }
}
