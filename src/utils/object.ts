/**
 * Returns a shallow copy of the record without its `undefined` entries, so
 * optional overrides never mask a default with `undefined`.
 */
export function omitUndefinedEntries<
  T extends Record<string, unknown | undefined>,
>(entries: T): Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> {
  const result: Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> = {};
  for (const key of Object.keys(entries) as (keyof T)[]) {
    const value = entries[key];
    if (value !== undefined) {
      (result as Record<keyof T, unknown>)[key] = value;
    }
  }
  return result;
}
