/**
 * Single-writer lock built on a promise chain.
 *
 * Tasks run one at a time in the order they were queued. A task that throws
 * releases the lock for the next one and rejects only its own caller.
 */
export class MutationLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: (() => void) | undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    await previous;
    try {
      return await task();
    } finally {
      this.pending--;
      release?.();
    }
  }

  /** Number of tasks running or waiting */
  get queueLength(): number {
    return this.pending;
  }
}
