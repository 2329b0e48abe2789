/**
 * Serialises asynchronous tasks per key. Each key owns a promise chain; a task
 * starts once every task previously queued on its keys has settled. Tasks on
 * disjoint keys run concurrently.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Runs `task` exclusively for every key in `keys`. Keys are deduplicated
   * and queued in sorted order, which keeps two multi-key tasks from waiting
   * on each other in opposite orders.
   */
  async runExclusive<T>(keys: string | readonly string[], task: () => Promise<T> | T): Promise<T> {
    const ordered = Array.from(new Set(typeof keys === "string" ? [keys] : keys)).sort();
    const previous = ordered.map((key) => this.tails.get(key) ?? Promise.resolve());

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    for (const key of ordered) {
      this.tails.set(key, current);
    }

    try {
      await Promise.all(previous);
      return await task();
    } finally {
      release();
      for (const key of ordered) {
        if (this.tails.get(key) === current) {
          this.tails.delete(key);
        }
      }
    }
  }

  /** Number of keys with queued or running work. */
  pendingKeys(): number {
    return this.tails.size;
  }
}
