/**
 * Binary lock serialising synchronous sends on one session. Waiters are
 * served in FIFO order. The release function handed to each holder is
 * idempotent, so a `finally` block and a timeout path may both call it.
 */
export class SendLock {
  private held = false;
  private readonly waiters: Array<() => void> = [];

  /** True while a holder owns the lock. */
  get isHeld(): boolean {
    return this.held;
  }

  /** Number of callers waiting for the lock. */
  get queueLength(): number {
    return this.waiters.length;
  }

  /** Resolves with a release function once the lock is owned by the caller. */
  acquire(): Promise<() => void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.createRelease());
    }
    return new Promise((resolve) => {
      this.waiters.push(() => resolve(this.createRelease()));
    });
  }

  /** Runs `task` while owning the lock. */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Ownership passes straight to the next waiter; `held` stays true.
        next();
        return;
      }
      this.held = false;
    };
  }
}
