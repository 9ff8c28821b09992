/**
 * Runs at most `maxConcurrent` tasks at once; the rest wait in FIFO order.
 * With a capacity of 1 it is a mutex, which is how the run registry uses it.
 */
export class ConcurrencyLimiter {
  private readonly maxConcurrent: number;
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError("maxConcurrent must be an integer >= 1");
    }
    this.maxConcurrent = maxConcurrent;
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  /** True when nothing runs and nothing waits. */
  get idle(): boolean {
    return this.active === 0 && this.waiters.length === 0;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active >= this.maxConcurrent) {
      // The releasing task hands its slot over, so `active` is not decremented in between
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    } else {
      this.active++;
    }
    try {
      return await task();
    } finally {
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.active--;
      }
    }
  }
}
