/**
 * Per-symbol running total of contracts replicated this session.
 *
 * Totals only grow, and only after a confirmed submission. Nothing is given
 * back when the venue later cancels or reduces an order.
 *
 * The ingestion path reads and the execution path writes. Both run on the
 * same event loop and neither read-check-write spans an await, so each call
 * here is atomic with respect to the other path.
 */
export class CapLedger {
  private readonly used = new Map<string, number>();

  constructor(private readonly maxPerSymbol: number) {}

  usedFor(symbol: string): number {
    return this.used.get(symbol) ?? 0;
  }

  /**
   * Whether `size` more contracts fit under the symbol ceiling. An event
   * without a symbol cannot be attributed to a ceiling, so it is admitted.
   */
  admits(symbol: string | undefined, size: number): boolean {
    if (!symbol) {
      return true;
    }
    return this.usedFor(symbol) + size <= this.maxPerSymbol;
  }

  record(symbol: string | undefined, size: number): void {
    if (!symbol || size <= 0) {
      return;
    }
    this.used.set(symbol, this.usedFor(symbol) + size);
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.used);
  }
}
