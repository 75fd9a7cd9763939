/**
 * Promise-chain mutual exclusion lock.
 *
 * Callers are served in arrival order. A failing critical section releases
 * the lock like a successful one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = 0;

  /** Whether a critical section is running or queued */
  get locked(): boolean {
    return this.held > 0;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => current);
    this.held += 1;

    await previous;
    try {
      return await fn();
    } finally {
      this.held -= 1;
      release();
    }
  }
}
