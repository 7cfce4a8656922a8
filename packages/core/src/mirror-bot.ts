// ============================================================
// MirrorBot: wires the replication pipeline together
//   ConnectionManager -> EventRouter -> DecisionEngine
//     -> OrderQueue -> OrderExecutionWorker -> OrderSubmitter
// and runs it until shutdown.
// ============================================================

import { createReplicationContext, type ReplicationContext } from './context.js';
import type { BotConfig } from './shared/config.js';
import type { DecisionJournal } from './shared/journal.js';
import { createLogger } from './shared/logger.js';
import type { AuthFrame } from './shared/protocol.js';
import { ConnectionManager, type ConnectionState } from './features/connection/connection-manager.js';
import { OrderExecutionWorker } from './features/execution/order-worker.js';
import type { OrderSubmitter } from './features/execution/order-submitter.js';
import { ShutdownCoordinator, type DrainOutcome } from './features/lifecycle/shutdown-coordinator.js';
import { ReplicationDecisionEngine } from './features/replication/decision-engine.js';
import { EventRouter } from './features/replication/event-router.js';

const logger = createLogger('MirrorBot');

export type BotState = 'idle' | 'running' | 'stopping' | 'stopped';

export interface MirrorBotOptions {
  config: BotConfig;
  submitter: OrderSubmitter;
  authFrame: () => AuthFrame;
  journal?: DecisionJournal;
  /** Wall clock for dedup TTLs */
  now?: () => number;
  /** Monotonic clock for session health */
  monotonicNow?: () => number;
  random?: () => number;
  failurePauseMs?: { min: number; max: number };
}

export interface BotStatus {
  state: BotState;
  connection: ConnectionState;
  queued: number;
  processed: number;
  capUsage: Record<string, number>;
  trackedOrders: number;
}

export class MirrorBot {
  readonly context: ReplicationContext;
  readonly engine: ReplicationDecisionEngine;
  readonly router: EventRouter;
  readonly connection: ConnectionManager;
  readonly worker: OrderExecutionWorker;
  private readonly coordinator: ShutdownCoordinator;
  private _state: BotState = 'idle';

  constructor(options: MirrorBotOptions) {
    const { config } = options;
    this.context = createReplicationContext(config, { journal: options.journal, now: options.now });
    const { journal, dedup, ledger, fills, queue } = this.context;

    this.engine = new ReplicationDecisionEngine({
      config: config.replication,
      dedup,
      ledger,
      fills,
      queue,
      journal,
    });
    this.router = new EventRouter(this.engine);

    this.connection = new ConnectionManager({
      url: config.exchange.wsUrl,
      insecure: config.exchange.wsInsecure,
      connection: config.connection,
      authFrame: options.authFrame,
      router: this.router,
      journal,
      now: options.monotonicNow,
      random: options.random,
    });

    this.coordinator = new ShutdownCoordinator(queue, this.connection, journal);

    this.worker = new OrderExecutionWorker({
      queue,
      submitter: options.submitter,
      ledger,
      journal,
      stopSignal: this.coordinator.signal,
      failurePauseMs: options.failurePauseMs,
      random: options.random,
    });
  }

  get state(): BotState {
    return this._state;
  }

  /**
   * Run ingestion and execution until shutdown() is called, then wait for
   * the worker to finish its current job (bounded by the shutdown timeout).
   */
  async run(): Promise<DrainOutcome> {
    if (this._state !== 'idle') {
      throw new Error(`Cannot run bot: state is ${this._state}`);
    }
    this._state = 'running';

    const { config } = this.context;
    logger.info(
      {
        multiplier: config.replication.multiplier,
        dryRun: config.orders.dryRun,
        allowSymbols: [...config.replication.allowSymbols],
        orderType: config.orders.orderType,
      },
      'Starting fill mirror',
    );

    const workerDone = this.worker.run();
    try {
      await this.connection.start();
    } finally {
      this.shutdown('finally');
      this._state = 'stopping';
    }

    const outcome = await this.coordinator.drain(workerDone, config.shutdownTimeoutMs);
    this.context.journal.action('shutdown_done', { outcome });
    this._state = 'stopped';
    logger.info({ outcome }, 'Fill mirror stopped');
    return outcome;
  }

  /** Idempotent; returns false if shutdown was already requested. */
  shutdown(reason = 'external'): boolean {
    return this.coordinator.request(reason);
  }

  get shutdownRequested(): boolean {
    return this.coordinator.requested;
  }

  status(): BotStatus {
    return {
      state: this._state,
      connection: this.connection.state,
      queued: this.context.queue.size,
      processed: this.worker.processed,
      capUsage: this.context.ledger.snapshot(),
      trackedOrders: this.context.fills.size,
    };
  }
}
