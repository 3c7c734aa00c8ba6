/**
 * Analytics Snapshots
 *
 * Computes every per-symbol (and per-pair) series in one call from bars and
 * flattens the latest values into the variables alert conditions read.
 */

import type { OHLCBar, TimeframeId } from "../trade/types.js";
import type { AlertContext, AnalyticsSnapshot, PairSnapshot, ValuePoint } from "./types.js";
import { closeSeries, presentValues } from "./series.js";
import { priceStatistics } from "./statistics.js";
import { rollingCorrelation, rollingZScore } from "./rolling.js";
import { hedgeRatio, spread } from "./regression.js";
import { adfTest } from "./adf.js";
import { returns, rollingVolatility } from "./volatility.js";

function last(points: readonly ValuePoint[]): number | null {
  return points.length > 0 ? points[points.length - 1].value : null;
}

/**
 * Build the analytics snapshot for one symbol's bars
 *
 * Computed:
 * - Price statistics over all closes
 * - Rolling z-score of closes
 * - ADF stationarity of closes
 * - Returns and annualized rolling volatility
 *
 * @param bars - Bars for a single symbol/timeframe, ascending
 * @param window - Rolling window length in bars
 */
export function buildSnapshot(
  symbol: string,
  timeframe: TimeframeId,
  bars: readonly OHLCBar[],
  window: number
): AnalyticsSnapshot {
  const closes = closeSeries(bars);
  const returnSeries = returns(closes);
  const zscore = rollingZScore(closes, window);
  const volatility = rollingVolatility(returnSeries, window);
  const lastBar = bars.length > 0 ? bars[bars.length - 1] : null;

  return {
    symbol,
    timeframe,
    window,
    barCount: bars.length,
    priceStats: priceStatistics(presentValues(closes)),
    zscore,
    adf: adfTest(closes),
    returns: returnSeries,
    volatility,
    latest: {
      time: lastBar?.bucketStart ?? null,
      price: lastBar?.close ?? null,
      volume: lastBar?.volume ?? null,
      zscore: last(zscore),
      volatility: last(volatility),
    },
  };
}

/**
 * Build the pair snapshot for two symbols' bars on matching bucket times
 *
 * The spread uses the fitted hedge ratio: spread = A - hedgeRatio · B.
 */
export function buildPairSnapshot(
  symbolA: string,
  symbolB: string,
  timeframe: TimeframeId,
  barsA: readonly OHLCBar[],
  barsB: readonly OHLCBar[],
  window: number
): PairSnapshot {
  const a = closeSeries(barsA);
  const b = closeSeries(barsB);
  const hedge = hedgeRatio(a, b);
  // Without a fitted relationship fall back to the plain difference
  const spreadSeries = spread(a, b, hedge.observations >= 2 && hedge.hedgeRatio !== 0 ? hedge.hedgeRatio : 1);

  return {
    symbolA,
    symbolB,
    timeframe,
    window,
    hedge,
    correlation: rollingCorrelation(a, b, window),
    spread: spreadSeries,
    spreadZscore: rollingZScore(spreadSeries, window),
    adf: adfTest(spreadSeries),
  };
}

/**
 * Flatten a snapshot into alert variables.
 * Undefined values (e.g., no z-score yet) are left out, so conditions that
 * reference them fail evaluation instead of comparing against 0.
 */
export function toAlertContext(snapshot: AnalyticsSnapshot): AlertContext {
  const context: AlertContext = {
    bars: snapshot.barCount,
    adf_pvalue: snapshot.adf.pValue,
    adf_statistic: snapshot.adf.statistic,
  };

  const { latest, priceStats } = snapshot;
  if (latest.price !== null) {
    context.price = latest.price;
    context.close = latest.price;
  }
  if (latest.volume !== null) context.volume = latest.volume;
  if (latest.zscore !== null) context.zscore = latest.zscore;
  if (latest.volatility !== null) context.volatility = latest.volatility;
  if (priceStats) {
    context.mean = priceStats.mean;
    context.std = priceStats.std;
    context.min = priceStats.min;
    context.max = priceStats.max;
  }

  return context;
}

/**
 * Flatten a pair snapshot into alert variables
 */
export function toPairAlertContext(pair: PairSnapshot): AlertContext {
  const context: AlertContext = {
    hedge_ratio: pair.hedge.hedgeRatio,
    r_squared: pair.hedge.rSquared,
    spread_adf_pvalue: pair.adf.pValue,
  };

  const correlation = last(pair.correlation);
  const spreadValue = last(pair.spread);
  const spreadZscore = last(pair.spreadZscore);
  if (correlation !== null) context.correlation = correlation;
  if (spreadValue !== null) context.spread = spreadValue;
  if (spreadZscore !== null) context.spread_zscore = spreadZscore;

  return context;
}
