/**
 * Generic normalization and numeric helpers.
 * These utilities are used across the processors, the ranker and config parsing.
 */

/**
 * Round a number to 2 decimal places. Returns a number (not string).
 */
export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Percentage change from `base` to `value`.
 * Returns undefined when the base is zero; callers decide how to report that.
 */
export function percentChange(base: number, value: number): number | undefined {
  if (base === 0 || !Number.isFinite(base) || !Number.isFinite(value)) return undefined;
  return ((value - base) / base) * 100;
}

/**
 * Parse market-cap notation: "100M", "1.5B", "2500000".
 * Returns undefined for anything that is not a positive amount.
 */
export function parseMarketCap(input: string | number): number | undefined {
  if (typeof input === 'number') {
    return Number.isFinite(input) && input > 0 ? input : undefined;
  }
  const text = input.trim().toUpperCase().replace(/[_,\s]/g, '');
  const match = /^(\d+(?:\.\d+)?)([MB])?$/.exec(text);
  if (!match) return undefined;
  const base = Number(match[1]);
  const multiplier = match[2] === 'B' ? 1_000_000_000 : match[2] === 'M' ? 1_000_000 : 1;
  const value = base * multiplier;
  return value > 0 ? value : undefined;
}

/**
 * Normalize a ticker symbol: trim and uppercase.
 */
export function normalizeTicker(input: string): string {
  return (input || '').trim().toUpperCase();
}
