/**
 * Async mutual exclusion for connection state transitions.
 *
 * Waiters are served in arrival order; releasing hands ownership straight
 * to the next waiter so no caller can slip in between.
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<(release: () => void) => void> = [];

  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return () => this.release();
    }

    return await new Promise<() => void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next(() => this.release());
      return;
    }
    this.locked = false;
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
