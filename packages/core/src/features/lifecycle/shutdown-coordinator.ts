// ============================================================
// ShutdownCoordinator: one-shot stop signal for the whole bot.
// Sets the stop flag, wakes the worker with the queue sentinel and
// closes the socket so the reconnect loop sees the flag and exits.
// ============================================================

import type { DecisionJournal } from '../../shared/journal.js';
import { createLogger } from '../../shared/logger.js';

const logger = createLogger('Shutdown');

export interface SentinelTarget {
  /** Wake a blocked consumer; returns how many queued items were abandoned. */
  close(): number;
}

export interface StoppableConnection {
  stop(): void;
}

export type DrainOutcome = 'drained' | 'timeout';

export class ShutdownCoordinator {
  private readonly controller = new AbortController();
  private _reason: string | null = null;

  constructor(
    private readonly queue: SentinelTarget,
    private readonly connection: StoppableConnection,
    private readonly journal: DecisionJournal,
  ) {}

  /** Aborted once shutdown has been requested. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get requested(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): string | null {
    return this._reason;
  }

  /**
   * Request shutdown. Returns false when it was already requested, in which
   * case nothing happens.
   */
  request(reason = 'external'): boolean {
    if (this.controller.signal.aborted) {
      return false;
    }
    this._reason = reason;
    logger.info({ reason }, 'Shutdown requested');
    this.journal.action('shutdown_start', { reason });

    this.controller.abort();
    const abandoned = this.queue.close();
    if (abandoned > 0) {
      logger.warn({ abandoned }, 'Queued top-ups abandoned at shutdown');
    }
    this.connection.stop();

    this.journal.action('shutdown_signal_sent', { abandoned });
    return true;
  }

  /**
   * Wait for the execution unit to finish its current job, at most
   * `timeoutMs`. Proceeds either way.
   */
  async drain(worker: Promise<void>, timeoutMs: number): Promise<DrainOutcome> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<DrainOutcome>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    try {
      const outcome = await Promise.race([worker.then((): DrainOutcome => 'drained'), timeout]);
      if (outcome === 'timeout') {
        logger.warn({ timeoutMs }, 'Worker did not finish before shutdown timeout');
      }
      return outcome;
    } finally {
      clearTimeout(timer);
    }
  }
}
