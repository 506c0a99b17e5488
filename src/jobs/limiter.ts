import { QUERY_DEFAULTS } from '../config/constants.js';

export type ReleasePermit = () => void;

/**
 * Counting permit pool. Waiters are served in arrival order.
 */
export class ConcurrencyLimiter {
  readonly capacity: number;
  private held = 0;
  private readonly waiters: Array<(release: ReleasePermit) => void> = [];

  constructor(capacity: number = QUERY_DEFAULTS.CONCURRENCY_LIMIT) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Permits currently held */
  get inFlight(): number {
    return this.held;
  }

  /** Callers waiting for a permit */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Resolves with a release function once a permit is free.
   * Releasing twice is a no-op.
   */
  acquire(): Promise<ReleasePermit> {
    if (this.held < this.capacity) {
      this.held += 1;
      return Promise.resolve(this.releaser());
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Run `fn` while holding a permit
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): ReleasePermit {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // The permit passes straight to the next waiter
        next(this.releaser());
      } else {
        this.held -= 1;
      }
    };
  }
}
