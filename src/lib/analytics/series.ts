/**
 * Series Helpers
 *
 * Conversions, joins and the shared rolling-window primitive.
 */

import type { OHLCBar } from "../trade/types.js";
import type { SeriesPoint, ValuePoint } from "./types.js";

/**
 * Close prices of a bar sequence as a series
 */
export function closeSeries(bars: readonly OHLCBar[]): ValuePoint[] {
  return bars.map((bar) => ({ time: bar.bucketStart, value: bar.close }));
}

/**
 * Volumes of a bar sequence as a series
 */
export function volumeSeries(bars: readonly OHLCBar[]): ValuePoint[] {
  return bars.map((bar) => ({ time: bar.bucketStart, value: bar.volume }));
}

/**
 * Values that are present and finite, in order
 */
export function presentValues(series: readonly SeriesPoint[]): number[] {
  const values: number[] = [];
  for (const point of series) {
    if (point.value !== null && Number.isFinite(point.value)) {
      values.push(point.value);
    }
  }
  return values;
}

/**
 * Inner-join two series on time, dropping unmatched times and gaps.
 * Output follows the order of `a`.
 */
export function innerJoin(
  a: readonly SeriesPoint[],
  b: readonly SeriesPoint[]
): { time: number; a: number; b: number }[] {
  const byTime = new Map<number, number>();
  for (const point of b) {
    if (point.value !== null && Number.isFinite(point.value)) {
      byTime.set(point.time, point.value);
    }
  }

  const joined: { time: number; a: number; b: number }[] = [];
  for (const point of a) {
    if (point.value === null || !Number.isFinite(point.value)) continue;
    const other = byTime.get(point.time);
    if (other !== undefined) {
      joined.push({ time: point.time, a: point.value, b: other });
    }
  }
  return joined;
}

/**
 * Apply a function over every full rolling window.
 *
 * A value at index i requires i >= window - 1 and every point in
 * [i - window + 1, i] to be present. Indices that do not qualify, or where
 * `fn` returns null, are absent from the output (not zero, not null).
 *
 * @param series - Ordered input series
 * @param window - Window length (>= 1)
 * @param fn - Receives the window's values, oldest first
 */
export function rollingApply(
  series: readonly SeriesPoint[],
  window: number,
  fn: (values: number[]) => number | null
): ValuePoint[] {
  if (!Number.isInteger(window) || window < 1 || series.length < window) return [];

  const out: ValuePoint[] = [];
  for (let i = window - 1; i < series.length; i++) {
    const values: number[] = [];
    for (let j = i - window + 1; j <= i; j++) {
      const v = series[j].value;
      if (v === null || !Number.isFinite(v)) break;
      values.push(v);
    }
    if (values.length < window) continue;

    const result = fn(values);
    if (result !== null && Number.isFinite(result)) {
      out.push({ time: series[i].time, value: result });
    }
  }
  return out;
}
