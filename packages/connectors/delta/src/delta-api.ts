import {
  createLogger,
  errorMessage,
  nullJournal,
  sleep as defaultSleep,
  type DecisionJournal,
  type HttpConfig,
  type SubmitResult,
} from '@fillmirror/core';
import { buildAuthHeaders, unixTimestamp } from './delta-auth.js';

const logger = createLogger('DeltaApi');

const RETRY_BASE_MS = 500;
const RETRY_MAX_MS = 4000;
const RETRY_JITTER = 0.25;

export interface DeltaApiConfig {
  apiBase: string;
  apiKey: string;
  apiSecret: string;
  userAgent: string;
  http: HttpConfig;
  journal?: DecisionJournal;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Wall clock in ms, used for request timestamps */
  now?: () => number;
}

/**
 * Pause before retry number `attempt` (1-based): 0.5s doubling, capped at 4s,
 * plus up to 25% jitter.
 */
export function retryDelayMs(attempt: number, random: () => number = Math.random): number {
  const backoff = Math.min(RETRY_BASE_MS * 2 ** (attempt - 1), RETRY_MAX_MS);
  return backoff * (1 + random() * RETRY_JITTER);
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

function parseBody(text: string): unknown {
  if (text.length === 0) {
    return '';
  }
  try {
    return JSON.parse(text);
  } catch {
    // Not JSON; keep the raw text for the journal
    return text;
  }
}

const roundSeconds = (ms: number): number => Math.round(ms / 10) / 100;

/**
 * Signed REST client. Never throws: transport failures that outlast the retry
 * budget come back as status 0 with the error message as body.
 */
export class DeltaApi {
  private readonly config: DeltaApiConfig;
  private readonly journal: DecisionJournal;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(config: DeltaApiConfig) {
    this.config = config;
    this.journal = config.journal ?? nullJournal;
    this.sleep = config.sleep ?? ((ms) => defaultSleep(ms));
    this.random = config.random ?? Math.random;
    this.now = config.now ?? Date.now;
  }

  async post(path: string, body: object): Promise<SubmitResult> {
    const url = `${this.config.apiBase}${path}`;
    const payload = JSON.stringify(body);
    const { retries } = this.config.http;

    for (let attempt = 1; ; attempt++) {
      // Re-signed per attempt so a retry never carries a stale timestamp
      const headers = buildAuthHeaders(
        { apiKey: this.config.apiKey, apiSecret: this.config.apiSecret },
        'POST',
        path,
        payload,
        this.config.userAgent,
        unixTimestamp(this.now()),
      );

      try {
        const result = await this.send(url, headers, payload);
        if (attempt < retries && isRetryableStatus(result.status)) {
          const waitMs = retryDelayMs(attempt, this.random);
          this.journal.action('rest_retry', { path, status: result.status, attempt, sleep: roundSeconds(waitMs) });
          logger.warn({ path, status: result.status, attempt, waitMs: Math.round(waitMs) }, 'Retrying REST call');
          await this.sleep(waitMs);
          continue;
        }
        return result;
      } catch (err) {
        const message = errorMessage(err);
        if (attempt >= retries) {
          logger.error({ path, attempt, error: message }, 'REST call failed, retries exhausted');
          return { status: 0, body: message };
        }
        const waitMs = retryDelayMs(attempt, this.random);
        this.journal.action('rest_exc_retry', { path, attempt, sleep: roundSeconds(waitMs), err: message });
        logger.warn({ path, attempt, error: message }, 'REST call threw, retrying');
        await this.sleep(waitMs);
      }
    }
  }

  /**
   * One request. Headers must arrive within connect + read timeout, and the
   * body within the read timeout after that.
   */
  private async send(url: string, headers: Record<string, string>, payload: string): Promise<SubmitResult> {
    const { connectTimeoutMs, readTimeoutMs } = this.config.http;
    const controller = new AbortController();
    let timer = setTimeout(() => controller.abort(), connectTimeoutMs + readTimeoutMs);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers,
        body: payload,
        signal: controller.signal,
      });
      clearTimeout(timer);
      timer = setTimeout(() => controller.abort(), readTimeoutMs);

      const text = await response.text();
      return { status: response.status, body: parseBody(text) };
    } finally {
      clearTimeout(timer);
    }
  }
}
