/**
 * ThreatLedger — Keyed Mutex
 *
 * Serializes async tasks that share a key. Tasks on different keys
 * run independently; there is no global lock.
 */

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run a task once every earlier task for the same key has settled.
   * The task's own result or rejection is returned to the caller.
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);

    // The chain only tracks completion; failures reach the caller through `run`.
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running tasks. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
