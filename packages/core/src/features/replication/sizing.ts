/**
 * Contracts to add so the net position tracks `quantity * multiplier`:
 * round((multiplier - 1) * quantity), clamped to [0, maxPerTrade].
 * Exact halves round to even, so 0.5 adds nothing and 2.5 adds 2.
 * A multiplier of 1.0 or less never adds anything.
 */
export function computeTopUpSize(quantity: number, multiplier: number, maxPerTrade: number): number {
  if (multiplier <= 1.0) {
    return 0;
  }
  const add = roundHalfEven((multiplier - 1.0) * quantity);
  return Math.max(0, Math.min(add, maxPerTrade));
}

export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5 || (diff === 0.5 && floor % 2 !== 0)) {
    return floor + 1;
  }
  return floor;
}
