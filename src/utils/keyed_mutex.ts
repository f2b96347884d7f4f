/**
 * @fileoverview Per-key mutual exclusion
 *
 * Tasks that share a key run one at a time in arrival order; tasks with
 * different keys never wait on each other. Used to serialize requests for
 * the same conversational session.
 *
 * @packageDocumentation
 */

/**
 * @example
 * ```typescript
 * const mutex = new KeyedMutex();
 * await mutex.runExclusive('user-42', async () => {
 *   session.update(intent);
 *   return recommender.getRecommendations(session);
 * });
 * ```
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `key` has finished. The lock is
   * released when `task` settles, whether it resolves or throws.
   */
  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether a task holds or awaits the lock for `key`.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with a running or queued task. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
