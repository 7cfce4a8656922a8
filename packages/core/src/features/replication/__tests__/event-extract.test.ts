import { describe, it, expect } from 'vitest';
import {
  extractPayloadEvents,
  extractSide,
  extractSymbol,
  toInteger,
  toOrderUpdateEvent,
  toTradeFillEvent,
} from '../event-extract.js';

describe('toInteger', () => {
  it('accepts whole numbers and integer strings', () => {
    expect(toInteger(5)).toBe(5);
    expect(toInteger('5')).toBe(5);
    expect(toInteger(' +12 ')).toBe(12);
  });

  it('rejects fractions and junk', () => {
    expect(toInteger(5.5)).toBeUndefined();
    expect(toInteger('5.5')).toBeUndefined();
    expect(toInteger('abc')).toBeUndefined();
    expect(toInteger(null)).toBeUndefined();
  });
});

describe('extractSymbol', () => {
  it('falls through the aliases and upper-cases', () => {
    expect(extractSymbol({ product_symbol: 'btcusd' })).toBe('BTCUSD');
    expect(extractSymbol({ symbol: '', product_symbol_name: 'ethusd' })).toBe('ETHUSD');
    expect(extractSymbol({})).toBeUndefined();
  });
});

describe('extractSide', () => {
  it('reads side or order_side by first letter', () => {
    expect(extractSide({ side: 'Buy' })).toBe('buy');
    expect(extractSide({ order_side: 'S' })).toBe('sell');
    expect(extractSide({ side: 'long' })).toBe('unknown');
    expect(extractSide({})).toBe('unknown');
  });
});

describe('extractPayloadEvents', () => {
  it('unwraps a list under the first matching key', () => {
    const frame = { type: 'user_trades', data: [{ id: 1 }, { id: 2 }] };
    expect(extractPayloadEvents(frame, ['payload', 'data'])).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it('unwraps a single object', () => {
    const frame = { type: 'orders', payload: { id: 9 } };
    expect(extractPayloadEvents(frame, ['payload', 'data'])).toEqual([{ id: 9 }]);
  });

  it('skips an empty object and tries the next key', () => {
    const frame = { type: 'user_trades', payload: {}, data: [{ id: 4 }] };
    expect(extractPayloadEvents(frame, ['payload', 'data'])).toEqual([{ id: 4 }]);
  });

  it('falls back to the frame when every key is empty', () => {
    const frame = { type: 'orders', id: 9, payload: {}, data: [] };
    expect(extractPayloadEvents(frame, ['payload', 'data'])).toEqual([frame]);
  });

  it('uses the frame itself when no key holds events', () => {
    const frame = { type: 'orders', id: 9, data: [] };
    expect(extractPayloadEvents(frame, ['payload', 'data'])).toEqual([frame]);
  });

  it('drops non-object items', () => {
    const frame = { type: 'user_trades', data: [{ id: 1 }, 'noise', 3] };
    expect(extractPayloadEvents(frame, ['data'])).toEqual([{ id: 1 }]);
  });
});

describe('toTradeFillEvent', () => {
  it('normalizes a fill', () => {
    const event = toTradeFillEvent({
      id: 'T1',
      fill_id: 'F1',
      symbol: 'btcusd',
      product_id: 27,
      side: 'buy',
      size: 100,
      price: '50000.5',
      client_order_id: 'manual-1',
    });

    expect(event).toEqual({
      kind: 'trade_fill',
      symbol: 'BTCUSD',
      productId: 27,
      side: 'buy',
      price: '50000.5',
      fillId: 'F1',
      tradeId: 'T1',
      tag: 'manual-1',
      text: undefined,
      quantity: 100,
    });
  });

  it('reads aliased quantity and trade id', () => {
    const event = toTradeFillEvent({ trade_id: 42, fill_size: '7' });
    expect(event.tradeId).toBe('42');
    expect(event.quantity).toBe(7);
  });

  it('leaves a fractional quantity undefined', () => {
    expect(toTradeFillEvent({ size: '1.5' }).quantity).toBeUndefined();
  });
});

describe('toOrderUpdateEvent', () => {
  it('prefers the average fill price and reads the cumulative size', () => {
    const event = toOrderUpdateEvent({
      id: 555,
      product_symbol: 'ETHUSD',
      side: 'sell',
      average_fill_price: '3000.1',
      price: '2999',
      filled_size: 30,
      unfilled_size: 20,
      state: 'open',
    });

    expect(event).toMatchObject({
      kind: 'order_update',
      orderId: '555',
      symbol: 'ETHUSD',
      side: 'sell',
      price: '3000.1',
      cumulativeFilled: 30,
      terminal: false,
    });
  });

  it('is terminal when closed or nothing is left unfilled', () => {
    expect(toOrderUpdateEvent({ state: 'closed' }).terminal).toBe(true);
    expect(toOrderUpdateEvent({ state: 'open', unfilled_size: 0 }).terminal).toBe(true);
    expect(toOrderUpdateEvent({ state: 'open', unfilled_size: '3' }).terminal).toBe(false);
  });
});
