import type { BotConfig } from './shared/config.js';
import { createJournal, DailyJournalStream, type DecisionJournal } from './shared/journal.js';
import type { TopUpJob } from './shared/protocol.js';
import { CapLedger } from './features/state/cap-ledger.js';
import { DedupStore } from './features/state/dedup-store.js';
import { OrderFillTracker } from './features/state/order-fill-tracker.js';
import { OrderQueue } from './features/execution/order-queue.js';

/**
 * Process-wide replication state, built once before the ingestion and
 * execution paths start and shared by both.
 */
export interface ReplicationContext {
  readonly config: BotConfig;
  readonly journal: DecisionJournal;
  readonly dedup: DedupStore;
  readonly ledger: CapLedger;
  readonly fills: OrderFillTracker;
  readonly queue: OrderQueue<TopUpJob>;
}

export interface ContextOptions {
  journal?: DecisionJournal;
  /** Wall clock for dedup TTLs */
  now?: () => number;
}

export function createJournalFor(config: BotConfig): DecisionJournal {
  return createJournal({
    verboseSkips: config.verboseDecisions,
    destination: config.logDir ? new DailyJournalStream(config.logDir) : undefined,
  });
}

export function createReplicationContext(config: BotConfig, options: ContextOptions = {}): ReplicationContext {
  return {
    config,
    journal: options.journal ?? createJournalFor(config),
    dedup: new DedupStore(config.dedup, options.now),
    ledger: new CapLedger(config.replication.maxTopUpPerSymbol),
    fills: new OrderFillTracker(),
    queue: new OrderQueue<TopUpJob>(config.orderQueueCapacity),
  };
}
