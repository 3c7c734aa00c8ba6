/**
 * Summary Statistics: mean, std, quantiles, cv
 *
 * Standard deviation uses sample semantics (divide by n - 1) here and in
 * every rolling calculation built on it.
 */

import type { PriceStatistics } from "./types.js";

/**
 * Arithmetic mean, or 0 for no values
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Sample standard deviation
 *
 * std = sqrt(Σ(x - mean)² / (n - 1))
 *
 * Returns exactly 0 when all values are equal, so a constant window
 * is recognised as zero variance rather than rounding noise.
 *
 * @returns Sample std, or 0 if fewer than 2 values
 */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;

  let allEqual = true;
  for (let i = 1; i < values.length; i++) {
    if (values[i] !== values[0]) {
      allEqual = false;
      break;
    }
  }
  if (allEqual) return 0;

  const m = mean(values);
  let sumSq = 0;
  for (const v of values) sumSq += (v - m) * (v - m);
  return Math.sqrt(sumSq / (values.length - 1));
}

/**
 * Quantile with linear interpolation between closest ranks
 *
 * @param sorted - Values sorted ascending (non-empty)
 * @param q - Quantile in [0, 1]
 */
export function quantileSorted(sorted: readonly number[], q: number): number {
  const h = (sorted.length - 1) * q;
  const lo = Math.floor(h);
  const hi = Math.min(lo + 1, sorted.length - 1);
  return sorted[lo] + (h - lo) * (sorted[hi] - sorted[lo]);
}

/**
 * Calculate summary statistics for a set of prices
 *
 * @param values - Present (non-gap) values
 * @returns Statistics, or null when there are no values
 */
export function priceStatistics(values: readonly number[]): PriceStatistics | null {
  if (values.length === 0) return null;

  const sorted = [...values].sort((a, b) => a - b);
  const m = mean(values);
  const std = sampleStd(values);
  const min = sorted[0];
  const max = sorted[sorted.length - 1];

  return {
    count: values.length,
    mean: m,
    std,
    min,
    max,
    median: quantileSorted(sorted, 0.5),
    q25: quantileSorted(sorted, 0.25),
    q75: quantileSorted(sorted, 0.75),
    range: max - min,
    cv: m !== 0 ? std / m : 0,
  };
}
