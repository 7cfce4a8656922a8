import pino from 'pino';

const redactPaths = [
  'DELTA_API_KEY',
  'DELTA_API_SECRET',
  'api_key',
  'apiKey',
  'api_secret',
  'apiSecret',
  'signature',
  'authorization',
  '*.DELTA_API_KEY',
  '*.DELTA_API_SECRET',
  '*.api_key',
  '*.apiKey',
  '*.api_secret',
  '*.apiSecret',
  '*.signature',
  '*.authorization',
];

export interface LoggerOptions {
  destination?: pino.DestinationStream;
  level?: string;
}

// Loggers that follow the process-wide level
const levelFollowers = new Set<pino.Logger>();

export function createLogger(name: string, options?: LoggerOptions): pino.Logger {
  const logger = pino({
    name,
    level: options?.level ?? process.env.LOG_LEVEL ?? 'info',
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
  }, options?.destination);
  if (options?.level === undefined) {
    levelFollowers.add(logger);
  }
  return logger;
}

/**
 * Change the level of every logger created without an explicit one.
 * Module loggers exist before configuration is read, so the CLI applies
 * LOG_LEVEL through this once the config has loaded.
 */
export function setLogLevel(level: string): void {
  for (const logger of levelFollowers) {
    logger.level = level;
  }
}

/**
 * Strip query string from a URL for safe logging.
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  } catch {
    // If URL parsing fails, strip everything after ?
    const qIndex = url.indexOf('?');
    return qIndex >= 0 ? url.substring(0, qIndex) : url;
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
