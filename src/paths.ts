import path from 'node:path';
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { OrchestratorError } from './errors.js';
import { ERROR_CODES } from './types.js';

/**
 * Raised when a payload addressed to a filesystem-capable server references a
 * path outside the server's configured allow-list. The dispatch coordinator
 * raises it before any attempt is made, so it is never retried.
 */
export class PathOutsideAllowListError extends OrchestratorError {
  constructor(
    readonly server: string,
    readonly attemptedPath: string,
    readonly allowedDirectories: readonly string[],
  ) {
    super(
      ERROR_CODES.DISPATCH_PATH_FORBIDDEN,
      `path '${attemptedPath}' is outside the directories allowed for server '${server}'`,
      'keep paths within the configured allowedDirectories',
      { server, attemptedPath, allowedDirectories: [...allowedDirectories] },
    );
    this.name = 'PathOutsideAllowListError';
  }
}

/**
 * Returns true when `candidate` resolves inside `rootDir` (or is `rootDir`
 * itself). Relative candidates are resolved against the root.
 */
export function isWithin(rootDir: string, candidate: string): boolean {
  const absoluteRoot = path.resolve(rootDir);
  const target = path.resolve(absoluteRoot, candidate);
  const relative = path.relative(absoluteRoot, target);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/** Payload keys carrying filesystem locations in filesystem server operations. */
const PATH_KEYS = new Set(['path', 'paths', 'source', 'destination']);

/**
 * Collects every path-like string found under {@link PATH_KEYS} in the
 * payload, descending into nested objects and arrays.
 */
export function collectPayloadPaths(payload: unknown): string[] {
  const found: string[] = [];
  const visit = (value: unknown, underPathKey: boolean): void => {
    if (typeof value === 'string') {
      if (underPathKey) {
        found.push(value);
      }
      return;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        visit(item, underPathKey);
      }
      return;
    }
    if (value && typeof value === 'object') {
      for (const [key, nested] of Object.entries(value)) {
        visit(nested, PATH_KEYS.has(key));
      }
    }
  };
  visit(payload, false);
  return found;
}

/**
 * Ensures every path referenced by the payload lies within one of the allowed
 * directories. Relative paths are interpreted against the first directory,
 * matching how filesystem servers resolve them.
 *
 * @throws {PathOutsideAllowListError} on the first offending path.
 */
export function assertPayloadWithinAllowList(
  server: string,
  allowedDirectories: readonly string[],
  payload: unknown,
): void {
  if (allowedDirectories.length === 0) {
    return;
  }
  for (const candidate of collectPayloadPaths(payload)) {
    const absolute = path.isAbsolute(candidate) ? candidate : path.resolve(allowedDirectories[0] ?? '/', candidate);
    if (!allowedDirectories.some((dir) => isWithin(dir, absolute))) {
      throw new PathOutsideAllowListError(server, candidate, allowedDirectories);
    }
  }
}
