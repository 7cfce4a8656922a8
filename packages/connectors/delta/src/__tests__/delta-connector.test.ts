import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ExecutableJob, OrderConfig, SubmitResult } from '@fillmirror/core';
import { DeltaConnector, adjustLimitPrice, buildClientOrderId, formatPrice } from '../delta-connector.js';

const post = vi.fn<(path: string, body: object) => Promise<SubmitResult>>();
const journal = { skip: vi.fn(), action: vi.fn() };

function createConnector(orders: Partial<OrderConfig> = {}) {
  let n = 0;
  return new DeltaConnector({
    exchange: {
      wsUrl: 'wss://socket.test',
      apiBase: 'https://api.test',
      apiKey: 'test-key',
      apiSecret: 'test-secret',
      wsInsecure: false,
      userAgent: 'test-agent',
    },
    orders: {
      dryRun: false,
      orderType: 'market_order',
      timeInForce: 'ioc',
      limitSlippageBps: 0,
      limitIocFallbackMarket: true,
      ...orders,
    },
    http: { readTimeoutMs: 1000, connectTimeoutMs: 1000, retries: 1 },
    selfTagPrefix: 'BOTMULT_',
    journal,
    api: { post },
    newClientSuffix: () => `cid${++n}`,
  });
}

const job: ExecutableJob = {
  auditId: 'T1',
  symbol: 'BTCUSD',
  productId: 27,
  side: 'buy',
  size: 100,
  priceHint: '50000.5',
};

beforeEach(() => {
  vi.clearAllMocks();
});

describe('formatPrice', () => {
  it('trims trailing zeros and the dot', () => {
    expect(formatPrice(100)).toBe('100');
    expect(formatPrice(0.5)).toBe('0.5');
    expect(formatPrice(123.456)).toBe('123.456');
  });
});

describe('adjustLimitPrice', () => {
  it('raises buys and lowers sells by the slippage', () => {
    expect(adjustLimitPrice('buy', '100', 50)).toBe('100.5');
    expect(adjustLimitPrice('sell', '100', 50)).toBe('99.5');
  });

  it('leaves the price alone at zero slippage', () => {
    expect(adjustLimitPrice('buy', '100.25', 0)).toBe('100.25');
  });

  it('returns undefined without a usable price', () => {
    expect(adjustLimitPrice('buy', undefined, 10)).toBeUndefined();
    expect(adjustLimitPrice('buy', '', 10)).toBeUndefined();
    expect(adjustLimitPrice('buy', 'n/a', 10)).toBeUndefined();
  });
});

describe('buildClientOrderId', () => {
  it('prefixes the self tag', () => {
    expect(buildClientOrderId('BOTMULT_', 'abc')).toBe('BOTMULT_abc');
  });

  it('generates a ten-character hex suffix by default', () => {
    expect(buildClientOrderId('BOTMULT_')).toMatch(/^BOTMULT_[0-9a-f]{10}$/);
  });
});

describe('DeltaConnector.submitTopUp', () => {
  it('submits a market order with the self tag', async () => {
    post.mockResolvedValue({ status: 200, body: { success: true } });
    const connector = createConnector();

    const result = await connector.submitTopUp(job);

    expect(result).toEqual({ status: 200, body: { success: true } });
    expect(post).toHaveBeenCalledWith('/v2/orders', {
      side: 'buy',
      order_type: 'market_order',
      time_in_force: 'ioc',
      size: 100,
      reduce_only: false,
      client_order_id: 'BOTMULT_cid1',
      product_id: 27,
    });
    expect(journal.action).toHaveBeenCalledWith('order_submit', {
      status: 200,
      resp: { success: true },
      req: expect.objectContaining({ client_order_id: 'BOTMULT_cid1' }),
    });
  });

  it('omits product_id when the event carried none', async () => {
    post.mockResolvedValue({ status: 200, body: {} });
    const connector = createConnector();

    await connector.submitTopUp({ ...job, productId: undefined });

    expect(post.mock.calls[0][1]).not.toHaveProperty('product_id');
  });

  it('does not touch the network in dry-run mode', async () => {
    const connector = createConnector({ dryRun: true });

    const result = await connector.submitTopUp(job);

    expect(result).toEqual({ status: 200, body: { dry_run: true } });
    expect(post).not.toHaveBeenCalled();
    expect(journal.action).toHaveBeenCalledWith('dry_run_order', {
      symbol: 'BTCUSD',
      product_id: 27,
      side: 'buy',
      size: 100,
      price: '50000.5',
    });
  });

  it('adds the adjusted limit price to limit orders', async () => {
    post.mockResolvedValue({ status: 200, body: {} });
    const connector = createConnector({ orderType: 'limit_order', timeInForce: 'gtc', limitSlippageBps: 100 });

    await connector.submitTopUp({ ...job, side: 'sell', priceHint: '200' });

    expect(post.mock.calls[0][1]).toMatchObject({
      order_type: 'limit_order',
      time_in_force: 'gtc',
      side: 'sell',
      limit_price: '198',
    });
  });

  it('refuses a limit order without a price hint', async () => {
    const connector = createConnector({ orderType: 'limit_order' });

    const result = await connector.submitTopUp({ ...job, priceHint: undefined });

    expect(result).toEqual({ status: 400, body: { error: 'missing_limit_price' } });
    expect(post).not.toHaveBeenCalled();
    expect(journal.skip).toHaveBeenCalledWith('missing_limit_price', { symbol: 'BTCUSD', side: 'buy', size: 100 });
  });

  it('falls back to a market order when an IOC limit finds no depth', async () => {
    post
      .mockResolvedValueOnce({
        status: 200,
        body: { result: { state: 'cancelled', cancellation_reason: 'order_size_not_available_in_orderbook' } },
      })
      .mockResolvedValueOnce({ status: 200, body: { result: { state: 'closed' } } });
    const connector = createConnector({ orderType: 'limit_order', timeInForce: 'ioc' });

    const result = await connector.submitTopUp(job);

    expect(result).toEqual({ status: 200, body: { result: { state: 'closed' } } });
    expect(post).toHaveBeenCalledTimes(2);
    expect(post.mock.calls[1][1]).toEqual({
      side: 'buy',
      order_type: 'market_order',
      time_in_force: 'ioc',
      size: 100,
      reduce_only: false,
      client_order_id: 'BOTMULT_cid2',
      product_id: 27,
    });
    expect(journal.action).toHaveBeenCalledWith('limit_ioc_cancel_fallback', {
      symbol: 'BTCUSD',
      side: 'buy',
      size: 100,
      limit_price: '50000.5',
    });
  });

  it('does not fall back when the fallback is disabled', async () => {
    post.mockResolvedValue({
      status: 200,
      body: { result: { state: 'cancelled', cancellation_reason: 'order_size_not_available_in_orderbook' } },
    });
    const connector = createConnector({ orderType: 'limit_order', limitIocFallbackMarket: false });

    await connector.submitTopUp(job);

    expect(post).toHaveBeenCalledTimes(1);
  });

  it('does not fall back on other cancellation reasons', async () => {
    post.mockResolvedValue({ status: 200, body: { result: { state: 'cancelled', cancellation_reason: 'self_trade' } } });
    const connector = createConnector({ orderType: 'limit_order' });

    await connector.submitTopUp(job);

    expect(post).toHaveBeenCalledTimes(1);
  });

  it('passes venue errors through', async () => {
    post.mockResolvedValue({ status: 400, body: { error: { code: 'insufficient_margin' } } });
    const connector = createConnector();

    const result = await connector.submitTopUp(job);

    expect(result).toEqual({ status: 400, body: { error: { code: 'insufficient_margin' } } });
  });
});

describe('DeltaConnector.authFrame', () => {
  it('stamps the frame in unix seconds', () => {
    const frame = createConnector().authFrame(1_700_000_000_500);
    expect(frame.payload.timestamp).toBe('1700000000');
    expect(frame.payload['api-key']).toBe('test-key');
  });
});
