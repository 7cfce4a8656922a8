// End to end through MirrorBot: socket frames in, submitted top-ups out.

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { loadConfig } from '../../shared/config.js';
import type { SubmitResult } from '../../shared/protocol.js';
import type { ExecutableJob } from '../../features/execution/order-submitter.js';
import { FakeSocket } from '../../features/connection/__tests__/fixtures/fake-socket.js';

vi.mock('ws', async () => {
  const { FakeSocket } = await import('../../features/connection/__tests__/fixtures/fake-socket.js');
  return { default: FakeSocket, WebSocket: FakeSocket };
});

const { MirrorBot } = await import('../../mirror-bot.js');

function createBot(env: Record<string, string> = {}) {
  const config = loadConfig({
    DELTA_API_KEY: 'test-key',
    DELTA_API_SECRET: 'test-secret',
    SHUTDOWN_TIMEOUT: '1',
    ...env,
  });
  const journal = { skip: vi.fn(), action: vi.fn() };
  const submitter = {
    submitTopUp: vi.fn(async (_job: ExecutableJob): Promise<SubmitResult> => ({ status: 200, body: { success: true } })),
  };
  const bot = new MirrorBot({
    config,
    submitter,
    journal,
    authFrame: () => ({
      type: 'auth',
      payload: { 'api-key': 'test-key', signature: 'test-signature', timestamp: '1700000000' },
    }),
    failurePauseMs: { min: 0, max: 0 },
  });
  return { bot, journal, submitter };
}

function connect(): FakeSocket {
  const socket = FakeSocket.latest;
  socket.open();
  socket.receive({ type: 'success', message: 'Authenticated' });
  return socket;
}

beforeEach(() => {
  FakeSocket.reset();
});

describe('MirrorBot', () => {
  it('amplifies a manual fill once and ignores its own fills', async () => {
    const { bot, journal, submitter } = createBot();
    const running = bot.run();
    const socket = connect();

    const fill = { id: 'T1', fill_id: 'F1', symbol: 'BTCUSD', product_id: 27, side: 'buy', size: 100, price: '50000' };
    socket.receive({ type: 'user_trades', data: [fill] });
    socket.receive({ type: 'user_trades', data: [fill] });
    socket.receive({
      type: 'user_trades',
      data: [{ id: 'T2', fill_id: 'F2', symbol: 'BTCUSD', side: 'buy', size: 100, client_order_id: 'BOTMULT_0123456789' }],
    });

    await vi.waitFor(() => expect(bot.status().processed).toBe(1));
    bot.shutdown('test');

    await expect(running).resolves.toBe('drained');
    expect(submitter.submitTopUp).toHaveBeenCalledTimes(1);
    expect(submitter.submitTopUp).toHaveBeenCalledWith({
      auditId: 'T1',
      symbol: 'BTCUSD',
      productId: 27,
      side: 'buy',
      size: 100,
      priceHint: '50000',
    });
    expect(journal.skip).toHaveBeenCalledWith('dup_fill_id', { fill_id: 'F1' });
    expect(journal.skip).toHaveBeenCalledWith('own_fill', { audit_id: 'T2', client_order_id: 'BOTMULT_0123456789' });
    expect(bot.status()).toMatchObject({ state: 'stopped', capUsage: { BTCUSD: 100 } });
  });

  it('re-checks the cap at execution time', async () => {
    const { bot, journal, submitter } = createBot({ MAX_TOPUP_PER_SYMBOL: '150' });
    const running = bot.run();
    const socket = connect();

    socket.receive({
      type: 'user_trades',
      data: [
        { id: 'T1', symbol: 'BTCUSD', side: 'sell', size: 100 },
        { id: 'T2', symbol: 'BTCUSD', side: 'sell', size: 100 },
      ],
    });

    await vi.waitFor(() => expect(bot.status().processed).toBe(2));
    bot.shutdown('test');
    await running;

    expect(submitter.submitTopUp).toHaveBeenCalledTimes(1);
    expect(journal.skip).toHaveBeenCalledWith(
      'symbol_cap_exceeded_worker',
      expect.objectContaining({ auditId: 'T2', add: 100 }),
    );
  });

  it('follows order updates by cumulative delta', async () => {
    const { bot, submitter } = createBot();
    const running = bot.run();
    const socket = connect();

    socket.receive({ type: 'orders', id: 9, symbol: 'ETHUSD', side: 'buy', filled_size: 30, unfilled_size: 20, state: 'open' });
    socket.receive({ type: 'orders', id: 9, symbol: 'ETHUSD', side: 'buy', filled_size: 30, unfilled_size: 20, state: 'open' });
    socket.receive({ type: 'orders', id: 9, symbol: 'ETHUSD', side: 'buy', filled_size: 50, unfilled_size: 0, state: 'closed' });

    await vi.waitFor(() => expect(bot.status().processed).toBe(2));
    bot.shutdown('test');
    await running;

    expect(submitter.submitTopUp.mock.calls.map(([job]) => job.size)).toEqual([30, 20]);
    expect(bot.status().trackedOrders).toBe(0);
  });

  it('shuts down cleanly before the session authenticates', async () => {
    const { bot, journal } = createBot();
    const running = bot.run();

    expect(bot.shutdown('signal_SIGINT')).toBe(true);
    expect(bot.shutdown('signal_SIGTERM')).toBe(false);

    await expect(running).resolves.toBe('drained');
    expect(journal.action).toHaveBeenCalledWith('shutdown_start', { reason: 'signal_SIGINT' });
    expect(journal.action).toHaveBeenLastCalledWith('shutdown_done', { outcome: 'drained' });
    expect(FakeSocket.instances).toHaveLength(1);
  });

  it('refuses to run twice', async () => {
    const { bot } = createBot();
    const running = bot.run();

    await expect(bot.run()).rejects.toThrow('Cannot run bot: state is running');

    bot.shutdown('test');
    await running;
  });
});
