/**
 * Core Volatility Calculator
 * Pure functions over ordered price histories.
 */

/** Per-minute vol used when the history holds fewer than two usable returns */
export const DEFAULT_VOLATILITY = 0.01;

/**
 * Log returns between consecutive prices.
 * Pairs where either price is non-positive (or not finite) are skipped.
 */
export function calculateLogReturns(prices: readonly number[]): number[] {
  const logReturns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    const prev = prices[i - 1];
    const curr = prices[i];
    if (!(prev > 0) || !(curr > 0) || !Number.isFinite(prev) || !Number.isFinite(curr)) continue;
    logReturns.push(Math.log(curr / prev));
  }
  return logReturns;
}

/** Sample (n - 1) standard deviation; 0 for fewer than two values */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;

  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance =
    values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Volatility per sampling step of an ordered price history.
 * Fed one-minute samples, this is the per-minute vol the fair-value model expects.
 */
export function estimateVolatility(
  priceHistory: readonly number[],
  defaultVol: number = DEFAULT_VOLATILITY,
): number {
  const logReturns = calculateLogReturns(priceHistory);
  if (logReturns.length < 2) return defaultVol;
  return sampleStdDev(logReturns);
}
