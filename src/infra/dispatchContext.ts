import { AsyncLocalStorage } from "node:async_hooks";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/**
 * Correlation fields describing the dispatch currently executing. The logger
 * reads them so every entry emitted while a tool call is in flight carries
 * the target server, the operation and the attempt number.
 */
export interface DispatchContext {
  server?: string;
  operation?: string;
  attempt?: number;
  workflow?: string;
  step?: string;
}

const storage = new AsyncLocalStorage<DispatchContext>();

/**
 * Executes the callback with the provided fields merged on top of the context
 * inherited from the caller, so a dispatch issued by a workflow step keeps the
 * workflow identifiers.
 */
export function runWithDispatchContext<T>(context: DispatchContext, callback: () => T): T {
  const parent = storage.getStore();
  return storage.run({ ...parent, ...context }, callback);
}

/** Retrieves the dispatch context associated with the current async execution. */
export function getDispatchContext(): DispatchContext | undefined {
  return storage.getStore();
}
