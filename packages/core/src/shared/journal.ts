// ============================================================
// DecisionJournal: append-only audit trail of every decision point.
// Each line is {"ts", "kind", "reason" | "action", "context"} so a
// session can be replayed from the file alone.
// ============================================================

import { join } from 'node:path';
import pino from 'pino';

export type JournalContext = Record<string, unknown>;

export interface DecisionJournal {
  /** A designed skip. Recorded only when verbose decisions are on. */
  skip(reason: string, context?: JournalContext): void;
  action(action: string, context?: JournalContext): void;
}

export interface JournalOptions {
  destination?: pino.DestinationStream;
  verboseSkips?: boolean;
}

type FileDestination = ReturnType<typeof pino.destination>;

function utcDay(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * Writes journal lines to `<dir>/events_<YYYY-MM-DD>.jsonl`, opening a new
 * file when the UTC day changes.
 */
export class DailyJournalStream implements pino.DestinationStream {
  private day: string | null = null;
  private current: FileDestination | null = null;

  constructor(
    private readonly dir: string,
    private readonly today: () => string = utcDay,
  ) {}

  get currentPath(): string | null {
    return this.day ? this.pathFor(this.day) : null;
  }

  write(line: string): void {
    const day = this.today();
    if (!this.current || day !== this.day) {
      this.current?.end();
      this.current = pino.destination({ dest: this.pathFor(day), mkdir: true, sync: true });
      this.day = day;
    }
    this.current.write(line);
  }

  close(): void {
    this.current?.end();
    this.current = null;
    this.day = null;
  }

  private pathFor(day: string): string {
    return join(this.dir, `events_${day}.jsonl`);
  }
}

export function createJournal(options: JournalOptions = {}): DecisionJournal {
  const verboseSkips = options.verboseSkips ?? true;
  const sink = pino({
    base: null,
    level: 'info',
    // The level formatter emits nothing, so the timestamp opens the object and takes no leading comma
    timestamp: () => `"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: () => ({}),
    },
    redact: {
      paths: ['context.apiKey', 'context.apiSecret', 'context.signature'],
      censor: '[REDACTED]',
    },
  }, options.destination);

  return {
    skip(reason, context = {}) {
      if (!verboseSkips) return;
      sink.info({ kind: 'skip', reason, context });
    },
    action(action, context = {}) {
      sink.info({ kind: 'action', action, context });
    },
  };
}

/** Journal that drops everything; for tools that only need the types wired. */
export const nullJournal: DecisionJournal = {
  skip() {},
  action() {},
};
