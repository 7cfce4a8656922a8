// Shared
export * from './shared/protocol.js';
export * from './shared/config.js';
export { createLogger, setLogLevel, sanitizeUrl, errorMessage, type LoggerOptions } from './shared/logger.js';
export {
  createJournal,
  DailyJournalStream,
  nullJournal,
  type DecisionJournal,
  type JournalContext,
  type JournalOptions,
} from './shared/journal.js';
export { sleep, randomBetween } from './shared/sleep.js';

// Features: state
export { TtlSet, DedupStore, type DedupSpace } from './features/state/dedup-store.js';
export { CapLedger } from './features/state/cap-ledger.js';
export { OrderFillTracker, type FillProgress } from './features/state/order-fill-tracker.js';

// Features: replication
export { computeTopUpSize } from './features/replication/sizing.js';
export { toTradeFillEvent, toOrderUpdateEvent, extractPayloadEvents } from './features/replication/event-extract.js';
export { EventRouter, parseFrame, classifyFrame, type FrameClass, type AccountEventSink } from './features/replication/event-router.js';
export {
  ReplicationDecisionEngine,
  type Decision,
  type Outcome,
  type SkipReason,
  type JobSink,
  type DecisionEngineDeps,
} from './features/replication/decision-engine.js';

// Features: execution
export { OrderQueue } from './features/execution/order-queue.js';
export type { OrderSubmitter, ExecutableJob } from './features/execution/order-submitter.js';
export { OrderExecutionWorker, type JobResult, type OrderWorkerOptions } from './features/execution/order-worker.js';

// Features: connection
export { nextBackoff, withJitter } from './features/connection/backoff.js';
export {
  ConnectionManager,
  PRIVATE_CHANNELS,
  type ConnectionState,
  type ConnectionManagerOptions,
  type FrameRouter,
} from './features/connection/connection-manager.js';

// Features: lifecycle
export { ShutdownCoordinator, type DrainOutcome } from './features/lifecycle/shutdown-coordinator.js';

// Root
export { createReplicationContext, createJournalFor, type ReplicationContext } from './context.js';
export { MirrorBot, type MirrorBotOptions, type BotState, type BotStatus } from './mirror-bot.js';
