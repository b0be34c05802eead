/**
 * KeyedMutex - Per-key single-writer queue
 *
 * Tasks sharing a key run one at a time in submission order; tasks with
 * different keys run concurrently. A failing task does not poison the queue.
 */

export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();

  /**
   * Run `task` once every earlier task for `key` has settled
   */
  async run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
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
      // Drop the entry once nothing else is queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether any task for `key` is running or queued
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export default KeyedMutex;
