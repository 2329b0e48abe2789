/**
 * Writes `changes` into `target`, where `null` deletes the key, and returns a
 * function restoring the touched keys to their previous values and places in
 * the iteration order. Keys written by others in the meantime are kept. Stores
 * use it to undo an in-memory write whose snapshot could not be saved.
 */
export function applyMapChanges<K, V extends object>(
  target: Map<K, V>,
  changes: Iterable<readonly [K, V | null]>,
): () => void {
  const order = new Set(target.keys());
  // `null` marks a key that did not exist before the first change to it.
  const previous = new Map<K, V | null>();
  for (const [key, next] of changes) {
    if (!previous.has(key)) {
      previous.set(key, target.get(key) ?? null);
    }
    if (next === null) {
      target.delete(key);
    } else {
      target.set(key, next);
    }
  }
  return () => {
    const current = new Map(target);
    target.clear();
    const restore = (key: K): void => {
      const value = previous.has(key) ? previous.get(key) : current.get(key);
      if (value !== undefined && value !== null) {
        target.set(key, value);
      }
    };
    for (const key of order) {
      restore(key);
    }
    for (const key of current.keys()) {
      if (!order.has(key)) {
        restore(key);
      }
    }
  };
}
