/**
 * Counting semaphore bounding concurrent per-VM work
 */

export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  /**
   * Resolves once a permit is held. The returned function gives it back
   * and is safe to call more than once.
   */
  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--;
    } else {
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  get availablePermits(): number {
    return this.available;
  }

  get pending(): number {
    return this.waiters.length;
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // hand the permit straight to the next waiter
      next();
    } else {
      this.available++;
    }
  }
}
