/**
 * Bounded FIFO hand-off between ingestion and execution.
 *
 * `offer` never blocks: a full queue rejects the item. `take` waits for the
 * next item. `close` is the shutdown sentinel: every pending and future
 * `take` resolves to null, and items still queued are abandoned.
 */
export class OrderQueue<T extends object> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T | null) => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`OrderQueue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  offer(item: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }

    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  take(): Promise<T | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }

    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    return new Promise<T | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Returns the number of queued items abandoned. Idempotent. */
  close(): number {
    if (this.closed) {
      return 0;
    }
    this.closed = true;

    const abandoned = this.items.length;
    this.items.length = 0;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
    return abandoned;
  }
}
