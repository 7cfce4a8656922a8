// ============================================================
// ReplicationDecisionEngine: decides whether an account event
// earns a top-up order. Checks run in a fixed order and stop at
// the first failure, each with its own skip reason:
//   dedup -> self-origin -> allow-list -> quantity -> sizing -> cap
// ============================================================

import { randomUUID } from 'node:crypto';
import { ALL_SYMBOLS, type ReplicationConfig } from '../../shared/config.js';
import type { DecisionJournal, JournalContext } from '../../shared/journal.js';
import type {
  AccountEvent,
  OrderUpdateEvent,
  TopUpJob,
  TradeFillEvent,
} from '../../shared/protocol.js';
import { createLogger } from '../../shared/logger.js';
import type { DedupStore } from '../state/dedup-store.js';
import type { CapLedger } from '../state/cap-ledger.js';
import type { OrderFillTracker } from '../state/order-fill-tracker.js';
import { computeTopUpSize } from './sizing.js';

const logger = createLogger('DecisionEngine');

export type SkipReason =
  | 'dup_fill_id'
  | 'dup_trade_id'
  | 'dup_fill_id_order'
  | 'own_fill'
  | 'own_order_update'
  | 'missing_order_id'
  | 'symbol_not_allowed'
  | 'missing_or_invalid_qty'
  | 'missing_or_invalid_cum'
  | 'no_new_fill_delta'
  | 'zero_topup'
  | 'symbol_cap_exceeded';

export type Decision =
  | { kind: 'job'; job: TopUpJob }
  | { kind: 'skip'; reason: SkipReason; context: JournalContext };

export type Outcome =
  | Decision
  | { kind: 'dropped'; job: TopUpJob };

export interface JobSink {
  /** Non-blocking; false when the job could not be accepted. */
  offer(job: TopUpJob): boolean;
}

export interface DecisionEngineDeps {
  config: ReplicationConfig;
  dedup: DedupStore;
  ledger: CapLedger;
  fills: OrderFillTracker;
  queue: JobSink;
  journal: DecisionJournal;
  newAuditSuffix?: () => string;
}

const skip = (reason: SkipReason, context: JournalContext = {}): Decision => ({ kind: 'skip', reason, context });

export class ReplicationDecisionEngine {
  private readonly config: ReplicationConfig;
  private readonly deps: DecisionEngineDeps;
  private readonly newAuditSuffix: () => string;

  constructor(deps: DecisionEngineDeps) {
    this.deps = deps;
    this.config = deps.config;
    this.newAuditSuffix = deps.newAuditSuffix ?? (() => randomUUID().replace(/-/g, '').slice(0, 8));
  }

  /**
   * Decide, journal the outcome, and enqueue the job when admitted.
   */
  process(event: AccountEvent): Outcome {
    const decision = this.decide(event);

    if (decision.kind === 'skip') {
      this.deps.journal.skip(decision.reason, decision.context);
      return decision;
    }

    const { job } = decision;
    if (!this.deps.queue.offer(job)) {
      logger.error({ job }, 'Order queue full, dropping top-up');
      this.deps.journal.action('queue_full_drop', { ...job });
      return { kind: 'dropped', job };
    }

    this.deps.journal.action('enqueue_topup', { ...job });
    return decision;
  }

  decide(event: AccountEvent): Decision {
    return event.kind === 'trade_fill' ? this.decideTradeFill(event) : this.decideOrderUpdate(event);
  }

  /** Whether a client order id or free-text tag marks one of our own orders. */
  isOwnTag(tag: string | undefined, text?: string): boolean {
    const prefix = this.config.selfTagPrefix;
    return (tag?.startsWith(prefix) ?? false) || (text?.startsWith(prefix) ?? false);
  }

  isAllowedSymbol(symbol: string | undefined): boolean {
    const allow = this.config.allowSymbols;
    if (allow.has(ALL_SYMBOLS)) {
      return true;
    }
    return symbol !== undefined && allow.has(symbol.toUpperCase());
  }

  private decideTradeFill(event: TradeFillEvent): Decision {
    const { dedup } = this.deps;

    if (event.fillId && dedup.checkAndRecord('fill', event.fillId)) {
      return skip('dup_fill_id', { fill_id: event.fillId });
    }

    const auditId = event.tradeId ?? `ut_${this.newAuditSuffix()}`;
    if (event.tradeId && dedup.checkAndRecord('trade', event.tradeId)) {
      return skip('dup_trade_id', { audit_id: auditId });
    }

    if (this.isOwnTag(event.tag, event.text)) {
      return skip('own_fill', { audit_id: auditId, client_order_id: event.tag });
    }

    if (!this.isAllowedSymbol(event.symbol)) {
      return skip('symbol_not_allowed', { audit_id: auditId, symbol: event.symbol });
    }

    if (event.quantity === undefined || event.quantity <= 0) {
      return skip('missing_or_invalid_qty', { audit_id: auditId });
    }

    return this.admit(event, auditId, event.quantity, { qty: event.quantity });
  }

  private decideOrderUpdate(event: OrderUpdateEvent): Decision {
    if (event.fillId && this.deps.dedup.checkAndRecord('fill', event.fillId)) {
      return skip('dup_fill_id_order', { fill_id: event.fillId });
    }

    if (this.isOwnTag(event.tag, event.text)) {
      return skip('own_order_update', { client_order_id: event.tag });
    }

    if (!event.orderId) {
      return skip('missing_order_id');
    }
    const auditId = `ord_${event.orderId}`;

    if (!this.isAllowedSymbol(event.symbol)) {
      this.forgetIfTerminal(event, event.orderId);
      return skip('symbol_not_allowed', { audit_id: auditId, symbol: event.symbol });
    }

    if (event.cumulativeFilled === undefined) {
      this.forgetIfTerminal(event, event.orderId);
      return skip('missing_or_invalid_cum', { audit_id: auditId });
    }

    const progress = this.deps.fills.observe(event.orderId, event.cumulativeFilled, event.terminal);
    if (progress.kind === 'no_new_fill') {
      return skip('no_new_fill_delta', { audit_id: auditId, cum: event.cumulativeFilled, prev: progress.previous });
    }

    return this.admit(event, auditId, progress.delta, { delta: progress.delta });
  }

  private forgetIfTerminal(event: OrderUpdateEvent, orderId: string): void {
    if (event.terminal) {
      this.deps.fills.forget(orderId);
    }
  }

  /** Sizing and cap admission, shared by both event kinds. */
  private admit(event: AccountEvent, auditId: string, quantity: number, sizingContext: JournalContext): Decision {
    const { multiplier, maxTopUpPerTrade } = this.config;
    const add = computeTopUpSize(quantity, multiplier, maxTopUpPerTrade);
    if (add <= 0) {
      return skip('zero_topup', { audit_id: auditId, ...sizingContext, multiplier });
    }

    if (!this.deps.ledger.admits(event.symbol, add)) {
      return skip('symbol_cap_exceeded', { audit_id: auditId, symbol: event.symbol, add });
    }

    return {
      kind: 'job',
      job: {
        auditId,
        symbol: event.symbol,
        productId: event.productId,
        side: event.side,
        size: add,
        priceHint: event.price,
      },
    };
  }
}
