/**
 * TierLock — one FIFO critical section per key.
 *
 * Tasks submitted under the same key run one at a time in submission
 * order; tasks under different keys run concurrently. A failing task
 * releases the lock like a succeeding one.
 */

export class TierLock<K> {
  private readonly tails = new Map<K, Promise<void>>();

  /**
   * Run a task once every earlier task for the same key has settled.
   */
  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail),
    );
    this.tails.set(key, tail);

    return result;
  }

  /**
   * Whether a task for the key is running or queued.
   */
  isLocked(key: K): boolean {
    return this.tails.has(key);
  }

  private release(key: K, tail: Promise<void>): void {
    // Only the last queued task clears the entry
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
