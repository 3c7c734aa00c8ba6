/**
 * Volatility Metrics: returns, rolling volatility
 */

import type { SeriesPoint, ValuePoint } from "./types.js";
import { rollingApply } from "./series.js";
import { sampleStd } from "./statistics.js";

/** Periods per year used to annualize volatility (daily-equivalent bars) */
export const ANNUALIZATION_PERIODS = 252;

/**
 * Calculate simple returns between consecutive points
 *
 * Return_t = (x_t - x_{t-1}) / x_{t-1}
 *
 * The first point has no predecessor and is dropped. A gap on either side,
 * or a previous value of 0, yields a null (missing) return.
 */
export function returns(series: readonly SeriesPoint[]): SeriesPoint[] {
  const out: SeriesPoint[] = [];
  for (let i = 1; i < series.length; i++) {
    const prev = series[i - 1].value;
    const curr = series[i].value;
    const value = prev === null || curr === null || prev === 0 ? null : (curr - prev) / prev;
    out.push({ time: series[i].time, value });
  }
  return out;
}

/**
 * Calculate annualized rolling volatility
 *
 * Volatility = rollingStd(returns, window) × √252
 *
 * Treats each bar as one trading day. For intraday bars the figure is a
 * scaled comparison value, not a true annual volatility.
 *
 * @param returnSeries - Output of returns()
 * @returns Volatility series, empty when shorter than the window
 */
export function rollingVolatility(returnSeries: readonly SeriesPoint[], window: number): ValuePoint[] {
  const factor = Math.sqrt(ANNUALIZATION_PERIODS);
  return rollingApply(returnSeries, window, (values) => sampleStd(values) * factor);
}
