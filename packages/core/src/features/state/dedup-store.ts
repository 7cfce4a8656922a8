import type { DedupConfig } from '../../shared/config.js';

/**
 * Membership set with per-entry TTL and a hard size bound.
 *
 * Entries live in a Map in insertion order; since every entry gets the same
 * TTL, that is also expiry order, so expired entries are always at the front.
 * Over capacity, the oldest entry goes regardless of TTL.
 */
export class TtlSet {
  private readonly entries = new Map<string, number>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxSize: number,
    private readonly now: () => number = Date.now,
  ) {
    if (maxSize < 1) {
      throw new Error(`TtlSet maxSize must be >= 1, got ${maxSize}`);
    }
  }

  get size(): number {
    this.purgeExpired(this.now());
    return this.entries.size;
  }

  has(id: string): boolean {
    const now = this.now();
    this.purgeExpired(now);
    const expiresAt = this.entries.get(id);
    return expiresAt !== undefined && expiresAt > now;
  }

  /** Insert or refresh `id`, moving it to the back of the eviction order. */
  add(id: string): void {
    const now = this.now();
    this.purgeExpired(now);
    this.entries.delete(id);
    this.entries.set(id, now + this.ttlMs);

    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /**
   * Record `id` and report whether it was already present. A hit refreshes
   * the entry so a burst of redeliveries keeps it alive.
   */
  checkAndRecord(id: string): boolean {
    const seen = this.has(id);
    this.add(id);
    return seen;
  }

  private purgeExpired(now: number): void {
    for (const [id, expiresAt] of this.entries) {
      if (expiresAt > now) break;
      this.entries.delete(id);
    }
  }
}

export type DedupSpace = 'fill' | 'trade';

export class DedupStore {
  private readonly sets: Record<DedupSpace, TtlSet>;

  constructor(config: DedupConfig, now: () => number = Date.now) {
    this.sets = {
      fill: new TtlSet(config.fillIdTtlMs, config.fillIdMax, now),
      trade: new TtlSet(config.tradeIdTtlMs, config.tradeIdMax, now),
    };
  }

  /** True when `id` was already handled in `space`. Records it either way. */
  checkAndRecord(space: DedupSpace, id: string): boolean {
    return this.sets[space].checkAndRecord(id);
  }

  has(space: DedupSpace, id: string): boolean {
    return this.sets[space].has(id);
  }

  size(space: DedupSpace): number {
    return this.sets[space].size;
  }
}
