import type { OrderSide, SubmitResult, TopUpJob } from '../../shared/protocol.js';

export type ExecutableJob = Omit<TopUpJob, 'side'> & { side: OrderSide };

/**
 * Places top-up orders on a venue. Implementations map transport failures
 * to a result with status 0 rather than rejecting.
 */
export interface OrderSubmitter {
  submitTopUp(job: ExecutableJob): Promise<SubmitResult>;
}
