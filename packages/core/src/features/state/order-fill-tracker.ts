export type FillProgress =
  | { kind: 'delta'; delta: number; previous: number }
  | { kind: 'no_new_fill'; previous: number };

/**
 * Last-observed cumulative filled size per order id, used to turn order
 * updates into incremental fills. Entries are dropped once the order is
 * terminal.
 */
export class OrderFillTracker {
  private readonly cumulative = new Map<string, number>();

  get size(): number {
    return this.cumulative.size;
  }

  get(orderId: string): number | undefined {
    return this.cumulative.get(orderId);
  }

  /**
   * Record the latest cumulative size for `orderId` and return what is new
   * since the previous observation. A terminal update removes the entry after
   * the delta is taken.
   */
  observe(orderId: string, cumulativeFilled: number, terminal: boolean): FillProgress {
    const previous = this.cumulative.get(orderId) ?? 0;
    if (terminal) {
      this.cumulative.delete(orderId);
    } else {
      this.cumulative.set(orderId, cumulativeFilled);
    }

    if (cumulativeFilled <= previous) {
      return { kind: 'no_new_fill', previous };
    }
    return { kind: 'delta', delta: cumulativeFilled - previous, previous };
  }

  forget(orderId: string): void {
    this.cumulative.delete(orderId);
  }
}
