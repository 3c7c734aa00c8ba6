/**
 * Rolling Metrics: mean, std, z-score, correlation
 *
 * All windows share the semantics of rollingApply: only full windows with
 * no gaps produce a value.
 */

import type { SeriesPoint, ValuePoint } from "./types.js";
import { innerJoin, rollingApply } from "./series.js";
import { mean, sampleStd } from "./statistics.js";

/**
 * Rolling mean over `window` points
 */
export function rollingMean(series: readonly SeriesPoint[], window: number): ValuePoint[] {
  return rollingApply(series, window, (values) => mean(values));
}

/**
 * Rolling sample standard deviation over `window` points
 */
export function rollingStd(series: readonly SeriesPoint[], window: number): ValuePoint[] {
  return rollingApply(series, window, (values) => sampleStd(values));
}

/**
 * Calculate rolling z-score
 *
 * Z = (x - rollingMean) / rollingStd
 *
 * Number of rolling standard deviations the latest value sits from its
 * rolling mean:
 * - |Z| > 2 = stretched, candidate for mean reversion
 * - |Z| < 1 = inside normal range
 *
 * Windows with zero deviation are absent, so a constant series yields an
 * empty result.
 *
 * @returns Z-score series, empty when the series is shorter than the window
 */
export function rollingZScore(series: readonly SeriesPoint[], window: number): ValuePoint[] {
  return rollingApply(series, window, (values) => {
    const std = sampleStd(values);
    if (std === 0) return null;
    return (values[values.length - 1] - mean(values)) / std;
  });
}

/**
 * Pearson correlation of two equal-length samples
 *
 * r = Σ(a - ā)(b - b̄) / sqrt(Σ(a - ā)² · Σ(b - b̄)²)
 *
 * @returns Correlation in [-1, 1], or null when either side has zero variance
 */
export function pearson(a: readonly number[], b: readonly number[]): number | null {
  const n = Math.min(a.length, b.length);
  if (n < 2) return null;

  const meanA = mean(a.slice(0, n));
  const meanB = mean(b.slice(0, n));
  let cov = 0;
  let varA = 0;
  let varB = 0;
  for (let i = 0; i < n; i++) {
    const da = a[i] - meanA;
    const db = b[i] - meanB;
    cov += da * db;
    varA += da * da;
    varB += db * db;
  }

  if (varA === 0 || varB === 0) return null;
  const r = cov / Math.sqrt(varA * varB);
  // Clamp rounding overshoot
  return Math.max(-1, Math.min(1, r));
}

/**
 * Calculate rolling correlation between two series
 *
 * The series are inner-joined on time first (unmatched times and gaps are
 * dropped), then Pearson correlation is taken over each window of `window`
 * joined points.
 */
export function rollingCorrelation(
  a: readonly SeriesPoint[],
  b: readonly SeriesPoint[],
  window: number
): ValuePoint[] {
  const joined = innerJoin(a, b);
  if (!Number.isInteger(window) || window < 2 || joined.length < window) return [];

  const out: ValuePoint[] = [];
  for (let i = window - 1; i < joined.length; i++) {
    const slice = joined.slice(i - window + 1, i + 1);
    const r = pearson(
      slice.map((p) => p.a),
      slice.map((p) => p.b)
    );
    if (r !== null) {
      out.push({ time: joined[i].time, value: r });
    }
  }
  return out;
}
