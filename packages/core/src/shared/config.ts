import { z } from 'zod';
import * as dotenv from 'dotenv';

export const ALL_SYMBOLS = 'ALL';

const flag = (fallback: boolean) =>
  z.preprocess(
    (val) => (typeof val === 'string' ? val.trim().toLowerCase() === 'true' : val),
    z.boolean().default(fallback),
  );

// Accepts "1_000_000" the way the operator's existing .env files write it
const numeric = (schema: z.ZodNumber, fallback: number) =>
  z.preprocess(
    (val) => {
      if (typeof val !== 'string') return val;
      return val.trim() === '' ? undefined : Number(val.replace(/_/g, ''));
    },
    schema.default(fallback),
  );

const configSchema = z.object({
  DELTA_WS_URL: z.string().url().default('wss://socket.india.delta.exchange'),
  DELTA_API_BASE: z.string().url().default('https://api.india.delta.exchange'),
  DELTA_API_KEY: z.string({ required_error: 'DELTA_API_KEY is required' }).min(1, 'DELTA_API_KEY is required'),
  DELTA_API_SECRET: z.string({ required_error: 'DELTA_API_SECRET is required' }).min(1, 'DELTA_API_SECRET is required'),
  WS_INSECURE: flag(false),

  USER_MULTIPLIER: numeric(z.number().finite(), 2.0),
  DRY_RUN: flag(false),
  ALLOW_SYMBOLS: z.string().default(ALL_SYMBOLS),
  ORDER_TYPE: z.enum(['market_order', 'limit_order']).default('market_order'),
  TIME_IN_FORCE: z.preprocess(
    (val) => (typeof val === 'string' ? val.trim().toLowerCase() : val),
    z.enum(['ioc', 'gtc', 'fok']).default('ioc'),
  ),
  LIMIT_SLIPPAGE_BPS: numeric(z.number().min(0), 0),
  LIMIT_IOC_FALLBACK_MARKET: flag(true),
  USER_AGENT: z.string().min(1).default('fillmirror-rest-client'),

  MAX_TOPUP_PER_TRADE: numeric(z.number().int().min(0), 1_000_000),
  MAX_TOPUP_PER_SYMBOL: numeric(z.number().int().min(0), 10_000_000),
  SELF_TAG_PREFIX: z.string().min(1).default('BOTMULT_'),
  VERBOSE_DECISIONS: flag(true),

  PING_INTERVAL: numeric(z.number().positive(), 30),
  PING_TIMEOUT: numeric(z.number().positive(), 5),
  HTTP_TIMEOUT: numeric(z.number().positive(), 10),
  HTTP_CONN_TIMEOUT: numeric(z.number().positive(), 3.05),
  HTTP_RETRIES: numeric(z.number().int().min(1), 3),
  BACKOFF_BASE: numeric(z.number().positive(), 1.0),
  BACKOFF_MAX: numeric(z.number().positive(), 60.0),
  BACKOFF_JITTER: numeric(z.number().min(0), 0.4),

  FILL_ID_TTL_SEC: numeric(z.number().positive(), 86_400),
  FILL_ID_MAX: numeric(z.number().int().positive(), 200_000),
  TRADE_ID_TTL_SEC: numeric(z.number().positive(), 86_400),
  TRADE_ID_MAX: numeric(z.number().int().positive(), 200_000),
  ORDER_QUEUE_CAPACITY: numeric(z.number().int().positive(), 1000),
  SHUTDOWN_TIMEOUT: numeric(z.number().positive(), 5),

  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_DIR: z.string().optional(),
});

/** Every environment key the configuration reads. */
export const CONFIG_KEYS: readonly string[] = Object.keys(configSchema.shape);

export type OrderType = 'market_order' | 'limit_order';
export type TimeInForce = 'ioc' | 'gtc' | 'fok';

export interface ExchangeConfig {
  wsUrl: string;
  apiBase: string;
  apiKey: string;
  apiSecret: string;
  wsInsecure: boolean;
  userAgent: string;
}

export interface ReplicationConfig {
  multiplier: number;
  /** Upper-cased symbols, or a set containing ALL_SYMBOLS */
  allowSymbols: ReadonlySet<string>;
  selfTagPrefix: string;
  maxTopUpPerTrade: number;
  maxTopUpPerSymbol: number;
}

export interface OrderConfig {
  dryRun: boolean;
  orderType: OrderType;
  timeInForce: TimeInForce;
  limitSlippageBps: number;
  limitIocFallbackMarket: boolean;
}

export interface ConnectionConfig {
  pingIntervalMs: number;
  pingTimeoutMs: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  backoffJitter: number;
}

export interface HttpConfig {
  readTimeoutMs: number;
  connectTimeoutMs: number;
  retries: number;
}

export interface DedupConfig {
  fillIdTtlMs: number;
  fillIdMax: number;
  tradeIdTtlMs: number;
  tradeIdMax: number;
}

export interface BotConfig {
  exchange: ExchangeConfig;
  replication: ReplicationConfig;
  orders: OrderConfig;
  connection: ConnectionConfig;
  http: HttpConfig;
  dedup: DedupConfig;
  orderQueueCapacity: number;
  shutdownTimeoutMs: number;
  verboseDecisions: boolean;
  logLevel: string;
  logDir?: string;
}

const seconds = (s: number): number => Math.round(s * 1000);

export function parseAllowSymbols(raw: string): ReadonlySet<string> {
  const symbols = raw
    .split(',')
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s.length > 0);
  return new Set(symbols.length > 0 ? symbols : [ALL_SYMBOLS]);
}

/**
 * Load and validate configuration. Throws ZodError on missing credentials or
 * malformed values; callers treat that as fatal before any connection opens.
 */
export function loadConfig(envOverrides?: Record<string, string | undefined>): BotConfig {
  if (!envOverrides) {
    dotenv.config();
  }
  const env = envOverrides ?? process.env;
  const raw = configSchema.parse(env);

  return {
    exchange: {
      wsUrl: raw.DELTA_WS_URL,
      apiBase: raw.DELTA_API_BASE.replace(/\/+$/, ''),
      apiKey: raw.DELTA_API_KEY,
      apiSecret: raw.DELTA_API_SECRET,
      wsInsecure: raw.WS_INSECURE,
      userAgent: raw.USER_AGENT,
    },
    replication: {
      multiplier: raw.USER_MULTIPLIER,
      allowSymbols: parseAllowSymbols(raw.ALLOW_SYMBOLS),
      selfTagPrefix: raw.SELF_TAG_PREFIX,
      maxTopUpPerTrade: raw.MAX_TOPUP_PER_TRADE,
      maxTopUpPerSymbol: raw.MAX_TOPUP_PER_SYMBOL,
    },
    orders: {
      dryRun: raw.DRY_RUN,
      orderType: raw.ORDER_TYPE,
      timeInForce: raw.TIME_IN_FORCE,
      limitSlippageBps: raw.LIMIT_SLIPPAGE_BPS,
      limitIocFallbackMarket: raw.LIMIT_IOC_FALLBACK_MARKET,
    },
    connection: {
      pingIntervalMs: seconds(raw.PING_INTERVAL),
      pingTimeoutMs: seconds(raw.PING_TIMEOUT),
      backoffBaseMs: seconds(raw.BACKOFF_BASE),
      backoffMaxMs: seconds(raw.BACKOFF_MAX),
      backoffJitter: raw.BACKOFF_JITTER,
    },
    http: {
      readTimeoutMs: seconds(raw.HTTP_TIMEOUT),
      connectTimeoutMs: seconds(raw.HTTP_CONN_TIMEOUT),
      retries: raw.HTTP_RETRIES,
    },
    dedup: {
      fillIdTtlMs: seconds(raw.FILL_ID_TTL_SEC),
      fillIdMax: raw.FILL_ID_MAX,
      tradeIdTtlMs: seconds(raw.TRADE_ID_TTL_SEC),
      tradeIdMax: raw.TRADE_ID_MAX,
    },
    orderQueueCapacity: raw.ORDER_QUEUE_CAPACITY,
    shutdownTimeoutMs: seconds(raw.SHUTDOWN_TIMEOUT),
    verboseDecisions: raw.VERBOSE_DECISIONS,
    logLevel: raw.LOG_LEVEL,
    logDir: raw.LOG_DIR || undefined,
  };
}
