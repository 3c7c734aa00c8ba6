/**
 * Trend Metrics: moving average, Bollinger bands
 */

import type { BollingerBands, SeriesPoint, ValuePoint } from "./types.js";
import { rollingApply } from "./series.js";
import { mean, sampleStd } from "./statistics.js";

/** Default Bollinger window */
export const BOLLINGER_WINDOW = 20;

/** Default Bollinger band width in standard deviations */
export const BOLLINGER_MULTIPLIER = 2.0;

/**
 * Simple moving average over `window` points
 */
export function movingAverage(series: readonly SeriesPoint[], window: number): ValuePoint[] {
  return rollingApply(series, window, (values) => mean(values));
}

/**
 * Calculate Bollinger bands
 *
 * Middle = SMA(window)
 * Upper  = Middle + multiplier × rollingStd(window)
 * Lower  = Middle - multiplier × rollingStd(window)
 *
 * All three bands come from the same windows, so their points line up.
 * A window whose mean or deviation is not finite is left out of all three.
 */
export function bollingerBands(
  series: readonly SeriesPoint[],
  window = BOLLINGER_WINDOW,
  multiplier = BOLLINGER_MULTIPLIER
): BollingerBands {
  // Windows whose mean or deviation overflows are absent from both, so match on time
  const deviations = new Map(
    rollingApply(series, window, (values) => sampleStd(values)).map((point) => [point.time, point.value])
  );

  const upper: ValuePoint[] = [];
  const middle: ValuePoint[] = [];
  const lower: ValuePoint[] = [];
  for (const point of rollingApply(series, window, (values) => mean(values))) {
    const deviation = deviations.get(point.time);
    if (deviation === undefined) continue;

    const width = deviation * multiplier;
    const top = point.value + width;
    const bottom = point.value - width;
    if (!Number.isFinite(top) || !Number.isFinite(bottom)) continue;

    upper.push({ time: point.time, value: top });
    middle.push(point);
    lower.push({ time: point.time, value: bottom });
  }

  return { upper, middle, lower };
}
