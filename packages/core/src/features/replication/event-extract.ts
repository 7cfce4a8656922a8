// ============================================================
// Tolerant field extraction from exchange payloads.
// Every reader returns undefined instead of throwing; the decision
// engine turns a missing field into a skip.
// ============================================================

import type { OrderUpdateEvent, Side, TradeFillEvent } from '../../shared/protocol.js';

export type RawEvent = Record<string, unknown>;

export function isRecord(value: unknown): value is RawEvent {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

/** First value among `keys` that is present (not null, undefined or ''). */
export function firstPresent(ev: RawEvent, keys: readonly string[]): unknown {
  for (const key of keys) {
    if (isPresent(ev[key])) {
      return ev[key];
    }
  }
  return undefined;
}

export function toId(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.length > 0 ? value : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

/** Whole contracts only: 5, "5" and "+5" parse; 5.5, "5.5", "abc" do not. */
export function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : undefined;
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function toDecimalString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim().length > 0 ? value.trim() : undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

export function extractSymbol(ev: RawEvent): string | undefined {
  const value = firstPresent(ev, ['symbol', 'product_symbol', 'product_symbol_name']);
  return value === undefined ? undefined : String(value).toUpperCase();
}

export function extractProductId(ev: RawEvent): number | undefined {
  for (const key of ['product_id', 'instrument_id']) {
    const id = toInteger(ev[key]);
    if (id !== undefined) {
      return id;
    }
  }
  return undefined;
}

/** "buy", "Buy", "b" -> buy; "sell", "S" -> sell; anything else -> unknown. */
export function extractSide(ev: RawEvent): Side {
  const value = firstPresent(ev, ['side', 'order_side']);
  if (value === undefined) {
    return 'unknown';
  }
  const s = String(value).toLowerCase();
  if (s.startsWith('b')) return 'buy';
  if (s.startsWith('s')) return 'sell';
  return 'unknown';
}

function extractTag(ev: RawEvent): string | undefined {
  return toId(firstPresent(ev, ['client_order_id', 'client_id', 'text']));
}

/**
 * Unwrap the event list from a channel frame. The payload may sit under
 * one of several keys, be a single object or a list, or be the frame itself.
 * Empty objects and lists fall through to the next key.
 */
export function extractPayloadEvents(frame: RawEvent, keys: readonly string[]): RawEvent[] {
  let payload: unknown = frame;
  for (const key of keys) {
    const candidate = frame[key];
    if ((isRecord(candidate) && Object.keys(candidate).length > 0) || (Array.isArray(candidate) && candidate.length > 0)) {
      payload = candidate;
      break;
    }
  }
  const items: unknown[] = Array.isArray(payload) ? payload : [payload];
  return items.filter(isRecord);
}

export function toTradeFillEvent(ev: RawEvent): TradeFillEvent {
  return {
    kind: 'trade_fill',
    symbol: extractSymbol(ev),
    productId: extractProductId(ev),
    side: extractSide(ev),
    price: toDecimalString(ev.price),
    fillId: toId(ev.fill_id),
    tradeId: toId(firstPresent(ev, ['id', 'trade_id'])),
    tag: extractTag(ev),
    text: toId(ev.text),
    quantity: toInteger(firstPresent(ev, ['size', 'fill_size', 'quantity', 'filled_quantity'])),
  };
}

export function toOrderUpdateEvent(ev: RawEvent): OrderUpdateEvent {
  const state = typeof ev.state === 'string' ? ev.state.toLowerCase() : '';
  const unfilled = toInteger(ev.unfilled_size);
  return {
    kind: 'order_update',
    symbol: extractSymbol(ev),
    productId: extractProductId(ev),
    side: extractSide(ev),
    price: toDecimalString(firstPresent(ev, ['average_fill_price', 'price'])),
    fillId: toId(ev.fill_id),
    orderId: toId(firstPresent(ev, ['id', 'order_id'])),
    tag: extractTag(ev),
    text: toId(ev.text),
    cumulativeFilled: toInteger(firstPresent(ev, ['filled_size', 'total_filled', 'cumulative_qty'])),
    terminal: state === 'closed' || unfilled === 0,
  };
}
