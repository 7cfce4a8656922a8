#!/usr/bin/env node
// ============================================================
// CLI: Commander-based CLI for the fill mirror
// Commands: start, config
// ============================================================

import { EventEmitter } from 'node:events';
import { pathToFileURL } from 'node:url';
import { Command, type OptionValues } from 'commander';
import { ZodError } from 'zod';
import {
  ALL_SYMBOLS,
  MirrorBot,
  createJournalFor,
  errorMessage,
  loadConfig,
  setLogLevel,
  type BotConfig,
} from '@fillmirror/core';
import { DeltaConnector } from '@fillmirror/connector-delta';

interface FlagSpec {
  flags: string;
  env: string;
  description: string;
}

// Every flag overrides the environment key it names
export const FLAG_SPECS: readonly FlagSpec[] = [
  { flags: '--ws-url <url>', env: 'DELTA_WS_URL', description: 'private socket endpoint' },
  { flags: '--api-base <url>', env: 'DELTA_API_BASE', description: 'REST base URL' },
  { flags: '--ws-insecure', env: 'WS_INSECURE', description: 'skip TLS certificate validation' },
  { flags: '--api-key <key>', env: 'DELTA_API_KEY', description: 'API key (prefer .env)' },
  { flags: '--api-secret <secret>', env: 'DELTA_API_SECRET', description: 'API secret (prefer .env)' },
  { flags: '--multiplier <n>', env: 'USER_MULTIPLIER', description: 'amplification factor' },
  { flags: '--dry-run', env: 'DRY_RUN', description: 'log top-ups instead of placing them' },
  { flags: '--allow-symbols <list>', env: 'ALLOW_SYMBOLS', description: 'comma list like "BTCUSD,ETHUSD" or "ALL"' },
  { flags: '--order-type <type>', env: 'ORDER_TYPE', description: 'market_order or limit_order' },
  { flags: '--tif <tif>', env: 'TIME_IN_FORCE', description: 'IOC, GTC or FOK' },
  { flags: '--limit-slippage-bps <bps>', env: 'LIMIT_SLIPPAGE_BPS', description: 'limit price shift in basis points' },
  { flags: '--limit-ioc-fallback-market', env: 'LIMIT_IOC_FALLBACK_MARKET', description: 'resubmit unfilled IOC limits as market' },
  { flags: '--no-limit-ioc-fallback-market', env: 'LIMIT_IOC_FALLBACK_MARKET', description: 'leave unfilled IOC limits cancelled' },
  { flags: '--max-topup-per-trade <n>', env: 'MAX_TOPUP_PER_TRADE', description: 'per-trade clamp in contracts' },
  { flags: '--max-topup-per-symbol <n>', env: 'MAX_TOPUP_PER_SYMBOL', description: 'per-symbol session cap in contracts' },
  { flags: '--self-tag-prefix <prefix>', env: 'SELF_TAG_PREFIX', description: 'client order id prefix of our own orders' },
  { flags: '--ping-interval <s>', env: 'PING_INTERVAL', description: 'socket ping interval' },
  { flags: '--ping-timeout <s>', env: 'PING_TIMEOUT', description: 'socket pong timeout' },
  { flags: '--log-dir <dir>', env: 'LOG_DIR', description: 'write the decision journal to daily files here' },
  { flags: '--verbose-decisions', env: 'VERBOSE_DECISIONS', description: 'journal skip decisions' },
  { flags: '--no-verbose-decisions', env: 'VERBOSE_DECISIONS', description: 'journal actions only' },
  { flags: '--log-level <level>', env: 'LOG_LEVEL', description: 'diagnostic log level' },
  { flags: '--user-agent <ua>', env: 'USER_AGENT', description: 'REST User-Agent header' },
  { flags: '--http-timeout <s>', env: 'HTTP_TIMEOUT', description: 'REST read timeout' },
  { flags: '--http-conn-timeout <s>', env: 'HTTP_CONN_TIMEOUT', description: 'REST connect timeout' },
  { flags: '--http-retries <n>', env: 'HTTP_RETRIES', description: 'attempts per REST call' },
  { flags: '--backoff-base <s>', env: 'BACKOFF_BASE', description: 'reconnect backoff base' },
  { flags: '--backoff-max <s>', env: 'BACKOFF_MAX', description: 'reconnect backoff ceiling' },
  { flags: '--backoff-jitter <f>', env: 'BACKOFF_JITTER', description: 'reconnect jitter fraction' },
  { flags: '--fill-id-ttl <s>', env: 'FILL_ID_TTL_SEC', description: 'how long fill ids stay in the dedup store' },
  { flags: '--fill-id-max <n>', env: 'FILL_ID_MAX', description: 'dedup store capacity for fill ids' },
  { flags: '--trade-id-ttl <s>', env: 'TRADE_ID_TTL_SEC', description: 'how long trade ids stay in the dedup store' },
  { flags: '--trade-id-max <n>', env: 'TRADE_ID_MAX', description: 'dedup store capacity for trade ids' },
  { flags: '--order-queue-capacity <n>', env: 'ORDER_QUEUE_CAPACITY', description: 'pending top-ups before new ones are dropped' },
  { flags: '--shutdown-timeout <s>', env: 'SHUTDOWN_TIMEOUT', description: 'worker drain bound at shutdown' },
];

/**
 * "--max-topup-per-trade <n>" -> "maxTopupPerTrade", the key commander stores it under.
 * A "--no-" flag shares the key of the flag it negates.
 */
export function optionKey(flags: string): string {
  const long = flags.split(' ')[0].replace(/^--(no-)?/, '');
  return long.replace(/-([a-z])/g, (_m, c: string) => c.toUpperCase());
}

/**
 * Environment overrides for the flags the user actually passed.
 */
export function flagsToEnv(options: OptionValues): Record<string, string> {
  const env: Record<string, string> = {};
  for (const spec of FLAG_SPECS) {
    const value: unknown = options[optionKey(spec.flags)];
    if (typeof value === 'boolean') {
      env[spec.env] = String(value);
    } else if (typeof value === 'string') {
      env[spec.env] = value;
    }
  }
  return env;
}

export function maskSecret(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return `${value.slice(0, 4)}...${value.slice(-4)}`;
}

export function describeConfig(config: BotConfig): string[] {
  const { exchange, replication, orders, connection, http } = config;
  const symbols = replication.allowSymbols.has(ALL_SYMBOLS) ? ALL_SYMBOLS : [...replication.allowSymbols].join(',');
  return [
    'Fill Mirror - Configuration',
    '===========================',
    `Socket: ${exchange.wsUrl}${exchange.wsInsecure ? ' (insecure)' : ''}`,
    `REST: ${exchange.apiBase}`,
    `API Key: ${maskSecret(exchange.apiKey)}`,
    'API Secret: ********',
    `Multiplier: ${replication.multiplier}`,
    `Dry run: ${orders.dryRun}`,
    `Symbols: ${symbols}`,
    `Order: ${orders.orderType} / ${orders.timeInForce.toUpperCase()}` +
      (orders.orderType === 'limit_order' ? ` (slippage ${orders.limitSlippageBps} bps, market fallback ${orders.limitIocFallbackMarket})` : ''),
    `Caps: ${replication.maxTopUpPerTrade} per trade, ${replication.maxTopUpPerSymbol} per symbol`,
    `Self tag: ${replication.selfTagPrefix}`,
    `Ping: every ${connection.pingIntervalMs / 1000}s, timeout ${connection.pingTimeoutMs / 1000}s`,
    `Backoff: ${connection.backoffBaseMs / 1000}s..${connection.backoffMaxMs / 1000}s, jitter ${connection.backoffJitter}`,
    `HTTP: timeout ${http.readTimeoutMs / 1000}s, connect ${http.connectTimeoutMs / 1000}s, ${http.retries} attempts`,
    `Journal: ${config.logDir ?? 'stdout'}${config.verboseDecisions ? ' (verbose)' : ''}`,
  ];
}

export interface ShutdownTarget {
  shutdown(reason: string): boolean;
}

/**
 * Route SIGINT/SIGTERM to a shutdown request tagged with the signal name.
 */
export function installSignalHandlers(target: ShutdownTarget, signals: EventEmitter = process): void {
  for (const name of ['SIGINT', 'SIGTERM']) {
    signals.on(name, () => {
      if (target.shutdown(`signal_${name}`)) {
        console.log(`Received ${name}, shutting down...`);
      }
    });
  }
}

export function applyEnv(overrides: Record<string, string>): void {
  for (const [key, value] of Object.entries(overrides)) {
    process.env[key] = value;
  }
}

export async function startBot(overrides: Record<string, string>): Promise<void> {
  applyEnv(overrides);
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const journal = createJournalFor(config);

  const connector = new DeltaConnector({
    exchange: config.exchange,
    orders: config.orders,
    http: config.http,
    selfTagPrefix: config.replication.selfTagPrefix,
    journal,
  });
  const bot = new MirrorBot({
    config,
    submitter: connector,
    authFrame: () => connector.authFrame(),
    journal,
  });
  installSignalHandlers(bot);

  console.log(
    `Starting fill mirror | multiplier=${config.replication.multiplier} | DRY_RUN=${config.orders.dryRun}`,
  );
  console.log('Press Ctrl+C to stop.');
  const outcome = await bot.run();
  console.log(`Stopped (${outcome}).`);
}

export function showConfig(overrides: Record<string, string>): void {
  applyEnv(overrides);
  for (const line of describeConfig(loadConfig())) {
    console.log(line);
  }
}

export interface CliActions {
  start(overrides: Record<string, string>): Promise<void>;
  config(overrides: Record<string, string>): void;
}

function reportFailure(prefix: string, error: unknown): void {
  if (error instanceof ZodError) {
    console.error(`${prefix}: invalid configuration`);
    for (const issue of error.issues) {
      console.error(`  ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
  } else {
    console.error(`${prefix}: ${errorMessage(error)}`);
  }
  process.exit(1);
}

function withFlags(command: Command): Command {
  for (const spec of FLAG_SPECS) {
    command.option(spec.flags, spec.description);
  }
  return command;
}

export function createProgram(actions: CliActions = { start: startBot, config: showConfig }): Command {
  const program = new Command();

  program
    .name('fillmirror')
    .description('Amplify your own fills on Delta Exchange with tagged top-up orders')
    .version('0.1.0');

  // --- start command ---
  withFlags(program.command('start').description('Connect and mirror fills until interrupted')).action(
    async (options: OptionValues) => {
      try {
        await actions.start(flagsToEnv(options));
        process.exit(0);
      } catch (error) {
        reportFailure('Failed to start', error);
      }
    },
  );

  // --- config command ---
  withFlags(program.command('config').description('Print the effective configuration (secrets masked)')).action(
    (options: OptionValues) => {
      try {
        actions.config(flagsToEnv(options));
      } catch (error) {
        reportFailure('Error', error);
      }
    },
  );

  return program;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  createProgram()
    .parseAsync()
    .catch((error: unknown) => reportFailure('Error', error));
}
