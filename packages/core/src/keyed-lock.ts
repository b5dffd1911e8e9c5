/**
 * Serializes async tasks that share a key while letting tasks with different
 * keys run concurrently. Each key keeps a promise tail that the next task
 * chains onto; the tail is dropped once the last queued task settles.
 *
 * The orchestrator uses one lock keyed by saga id so that at most one reply
 * per instance is processed at a time.
 */
export class KeyedLock {
  private readonly _tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve();
    const current = previous.then(task);
    // The tail only orders tasks; the task's own outcome is returned below.
    const tail = current.then(
      () => undefined,
      () => undefined,
    );
    this._tails.set(key, tail);
    try {
      return await current;
    } finally {
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    }
  }

  /** Number of keys with a task queued or running. */
  get activeKeys(): number {
    return this._tails.size;
  }
}
