/**
 * Counting semaphore for bounding concurrent async work.
 *
 * Permits are handed directly to the oldest waiter on release, so waiters
 * are served in FIFO order.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Semaphore capacity must be a positive integer, got ${capacity}`,
      );
    }
    this.available = capacity;
  }

  /** Number of permits currently held */
  get inUse(): number {
    return this.capacity - this.available;
  }

  /** Number of callers waiting for a permit */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a permit. Resolves to a release function that is safe to
   * call more than once. Rejects with the signal's reason if aborted
   * while waiting.
   */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.createRelease());
    }

    return new Promise((resolve, reject) => {
      const grant = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve(this.createRelease());
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(grant);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(grant);
    });
  }

  /** Run `fn` while holding a permit */
  async use<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.available++;
      }
    };
  }
}
