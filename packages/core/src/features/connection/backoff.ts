/**
 * Reconnect delay before jitter. A session that proved healthy resets to
 * base; one that never did doubles the previous delay, up to max.
 */
export function nextBackoff(previousMs: number, hadHealth: boolean, baseMs: number, maxMs: number): number {
  if (hadHealth) {
    return baseMs;
  }
  return Math.min(previousMs * 2, maxMs);
}

/** backoff * (1 + uniform(0, jitterFraction)) */
export function withJitter(backoffMs: number, jitterFraction: number, random: () => number = Math.random): number {
  return backoffMs * (1 + random() * jitterFraction);
}
