/**
 * Counting semaphore bounding in-flight backend requests.
 */

type Release = () => void;

export class ConcurrencyLimiter {
  private available: number;
  private readonly waiters: Array<(release: Release) => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
    this.available = limit;
  }

  /** Requests currently holding a slot. */
  get active(): number {
    return this.limit - this.available;
  }

  /** Requests waiting for a slot. */
  get pending(): number {
    return this.waiters.length;
  }

  /** Resolve with a release function once a slot is free. */
  acquire(): Promise<Release> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.createRelease());
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Run `fn` inside a slot, releasing it however `fn` settles. */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Hand the slot straight to the next waiter.
        next(this.createRelease());
      } else {
        this.available++;
      }
    };
  }
}
