/**
 * Counting semaphore for bounding concurrent async work.
 *
 * Waiters are served FIFO. A release hands the slot straight to the next
 * waiter, so `available` never exceeds the capacity.
 */
export class Semaphore {
  private waiters: (() => void)[] = [];
  private count: number;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.count = capacity;
  }

  /** Free slots */
  get available(): number {
    return this.count;
  }

  /** Callers suspended in acquire() */
  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.count > 0) {
      this.count--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else if (this.count < this.capacity) {
      this.count++;
    }
  }
}
