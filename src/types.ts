/**
 * Shared types used across the conductor. Grouping these definitions keeps
 * the error codes and their normalisation helpers consistent between modules.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Keeping a single source of truth ensures every tool emits consistent codes
 * which simplifies documentation and client handling.
 */
export const ERROR_CATALOG = {
  REGISTRY: {
    UNKNOWN_SERVER: "E-REGISTRY-UNKNOWN-SERVER",
    CAPABILITY_UNSUPPORTED: "E-REGISTRY-CAPABILITY-UNSUPPORTED",
    DUPLICATE_SERVER: "E-REGISTRY-DUPLICATE-SERVER",
  },
  DISPATCH: {
    FAILED: "E-DISPATCH-FAILED",
    UNREACHABLE: "E-DISPATCH-UNREACHABLE",
    TIMEOUT: "E-DISPATCH-TIMEOUT",
    CANCELLED: "E-DISPATCH-CANCELLED",
    CONNECTION: "E-DISPATCH-CONNECTION",
    PATH_FORBIDDEN: "E-DISPATCH-PATH-FORBIDDEN",
    REMOTE: "E-DISPATCH-REMOTE",
    UNEXPECTED: "E-DISPATCH-UNEXPECTED",
    INVALID_INPUT: "E-DISPATCH-INVALID-INPUT",
  },
  MEMORY: {
    NOT_FOUND: "E-MEMORY-NOTFOUND",
    UNEXPECTED: "E-MEMORY-UNEXPECTED",
    INVALID_INPUT: "E-MEMORY-INVALID-INPUT",
  },
  GRAPH: {
    NOT_FOUND: "E-GRAPH-NOTFOUND",
    DANGLING_REFERENCE: "E-GRAPH-DANGLING-REFERENCE",
    UNEXPECTED: "E-GRAPH-UNEXPECTED",
    INVALID_INPUT: "E-GRAPH-INVALID-INPUT",
  },
  THINK: {
    INVALID_BRANCH_ORIGIN: "E-THINK-INVALID-BRANCH-ORIGIN",
    INVALID_REVISION_TARGET: "E-THINK-INVALID-REVISION-TARGET",
    CAPACITY: "E-THINK-CAPACITY",
    UNEXPECTED: "E-THINK-UNEXPECTED",
    INVALID_INPUT: "E-THINK-INVALID-INPUT",
  },
  WORKFLOW: {
    PARTIAL: "E-WORKFLOW-PARTIAL",
    CANCELLED: "E-WORKFLOW-CANCELLED",
    UNEXPECTED: "E-WORKFLOW-UNEXPECTED",
    INVALID_INPUT: "E-WORKFLOW-INVALID-INPUT",
  },
  CONFIG: {
    INVALID: "E-CONFIG-INVALID",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const [familyKey, family] of Object.entries(catalog)) {
    for (const [codeKey, code] of Object.entries(family)) {
      flat[`${familyKey}_${codeKey}`] = code;
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.MEMORY_NOT_FOUND`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the conductor. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 160;

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. If the provided text is empty once trimmed a generic
 * fallback is returned so clients never receive an empty string.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/**
 * Normalises the optional hint attached to an error. Empty strings collapse to
 * `undefined` while overly long hints are truncated.
 */
export function normaliseErrorHint(hint?: string): string | undefined {
  if (hint === undefined) {
    return undefined;
  }
  const collapsed = hint.replace(/\s+/g, " ").trim();
  if (collapsed.length === 0) {
    return undefined;
  }
  if (collapsed.length <= ERROR_TEXT_MAX_LENGTH) {
    return collapsed;
  }
  return `${collapsed.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}
