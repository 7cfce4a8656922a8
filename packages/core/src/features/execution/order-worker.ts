// ============================================================
// OrderExecutionWorker: drains the order queue one job at a time,
// re-checks admission against the live ledger, submits, and books
// the size against the symbol cap only on success.
// ============================================================

import type { DecisionJournal } from '../../shared/journal.js';
import { createLogger, errorMessage } from '../../shared/logger.js';
import { isSuccessStatus, type SubmitResult, type TopUpJob } from '../../shared/protocol.js';
import { randomBetween, sleep } from '../../shared/sleep.js';
import type { CapLedger } from '../state/cap-ledger.js';
import type { OrderQueue } from './order-queue.js';
import type { ExecutableJob, OrderSubmitter } from './order-submitter.js';

const logger = createLogger('OrderWorker');

export type JobResult = 'placed' | 'failed' | 'invalid' | 'cap_exceeded';

export interface OrderWorkerOptions {
  queue: OrderQueue<TopUpJob>;
  submitter: OrderSubmitter;
  ledger: CapLedger;
  journal: DecisionJournal;
  stopSignal: AbortSignal;
  /** Pause after a failed submission, drawn uniformly from this range. */
  failurePauseMs?: { min: number; max: number };
  random?: () => number;
}

export class OrderExecutionWorker {
  private readonly options: OrderWorkerOptions;
  private readonly failurePause: { min: number; max: number };
  private _processed = 0;

  constructor(options: OrderWorkerOptions) {
    this.options = options;
    this.failurePause = options.failurePauseMs ?? { min: 1250, max: 5000 };
  }

  get processed(): number {
    return this._processed;
  }

  /**
   * Run until the queue yields the shutdown sentinel.
   */
  async run(): Promise<void> {
    logger.info('Order worker started');
    for (;;) {
      const job = await this.options.queue.take();
      if (job === null) {
        logger.info({ processed: this._processed }, 'Order worker stopped');
        return;
      }

      const result = await this.execute(job);
      this._processed++;

      if (result === 'failed' && !this.options.stopSignal.aborted) {
        const pauseMs = randomBetween(this.failurePause.min, this.failurePause.max, this.options.random);
        logger.warn({ pauseMs }, 'Order failed, pausing before next job');
        await sleep(pauseMs, this.options.stopSignal);
      }
    }
  }

  async execute(job: TopUpJob): Promise<JobResult> {
    const { journal, ledger } = this.options;
    journal.action('dequeue_topup', { ...job });

    const executable = toExecutable(job);
    if (!executable) {
      journal.skip('invalid_job', { ...job });
      return 'invalid';
    }

    // Other jobs may have been booked since this one was admitted
    if (!ledger.admits(job.symbol, job.size)) {
      journal.skip('symbol_cap_exceeded_worker', { ...job, add: job.size });
      return 'cap_exceeded';
    }

    const result = await this.submit(executable);
    journal.action('order_result', { ...job, status: result.status, resp: result.body });

    if (isSuccessStatus(result.status)) {
      ledger.record(job.symbol, job.size);
      logger.info(
        { auditId: job.auditId, symbol: job.symbol, side: job.side, size: job.size, used: job.symbol ? ledger.usedFor(job.symbol) : undefined },
        'Top-up placed',
      );
      return 'placed';
    }

    logger.error({ auditId: job.auditId, status: result.status, body: result.body }, 'Top-up order failed');
    return 'failed';
  }

  private async submit(job: ExecutableJob): Promise<SubmitResult> {
    try {
      return await this.options.submitter.submitTopUp(job);
    } catch (err) {
      logger.error({ auditId: job.auditId, error: errorMessage(err) }, 'Order submitter threw');
      return { status: 0, body: errorMessage(err) };
    }
  }
}

function toExecutable(job: TopUpJob): ExecutableJob | null {
  if (!(job.size > 0)) {
    return null;
  }
  if (job.side === 'buy' || job.side === 'sell') {
    return { ...job, side: job.side };
  }
  return null;
}
