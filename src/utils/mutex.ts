/**
 * Single-permit async lock
 *
 * Callers queue in arrival order; a rejected task releases the permit like a
 * resolved one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  /**
   * Number of tasks holding or waiting for the permit
   */
  get waiting(): number {
    return this.pending;
  }

  get isLocked(): boolean {
    return this.pending > 0;
  }
}
