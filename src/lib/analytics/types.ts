/**
 * Types for rolling analytics calculations
 */

import type { TimeframeId } from "../trade/types.js";

/**
 * One observation of a time series. `null` marks a gap, which propagates
 * as a missing output and is never interpolated.
 */
export interface SeriesPoint {
  /** Epoch milliseconds */
  time: number;
  value: number | null;
}

/** A series point that is known to be present */
export interface ValuePoint {
  time: number;
  value: number;
}

/**
 * Summary statistics. Standard deviation uses sample semantics (n - 1).
 */
export interface PriceStatistics {
  count: number;
  mean: number;
  /** Sample standard deviation; 0 when fewer than 2 values */
  std: number;
  min: number;
  max: number;
  median: number;
  q25: number;
  q75: number;
  range: number;
  /** Coefficient of variation (std / mean); 0 when mean is 0 */
  cv: number;
}

/**
 * OLS regression of A (dependent) on B (independent) with intercept.
 * All zeros means "no signal" (too few points or zero variance).
 */
export interface HedgeRatioResult {
  hedgeRatio: number;
  intercept: number;
  rSquared: number;
  /** Number of joined observations used */
  observations: number;
}

export type CriticalLevel = "1%" | "5%" | "10%";

/**
 * Augmented Dickey-Fuller test result.
 * The sentinel (statistic 0, pValue 1, no critical values) means
 * non-stationarity could not be rejected.
 */
export interface AdfResult {
  statistic: number;
  pValue: number;
  criticalValues: Partial<Record<CriticalLevel, number>>;
  /** Number of lagged differences selected by AIC */
  usedLag: number;
  /** Observations in the final regression */
  observations: number;
  isStationary: boolean;
}

export interface BollingerBands {
  upper: ValuePoint[];
  middle: ValuePoint[];
  lower: ValuePoint[];
}

export interface VolumeProfile {
  /** Bin-center prices, ascending */
  priceLevels: number[];
  /** Traded volume per bin, aligned with priceLevels */
  volumes: number[];
  /** Point of control: price level with the most volume, null when empty */
  poc: number | null;
}

/**
 * Derived series for one symbol/timeframe/window. Recomputed on demand, never stored.
 */
export interface AnalyticsSnapshot {
  symbol: string;
  timeframe: TimeframeId;
  window: number;
  barCount: number;
  priceStats: PriceStatistics | null;
  zscore: ValuePoint[];
  adf: AdfResult;
  returns: SeriesPoint[];
  volatility: ValuePoint[];
  latest: {
    time: number | null;
    price: number | null;
    volume: number | null;
    zscore: number | null;
    volatility: number | null;
  };
}

/**
 * Derived series for a pair of symbols on matching timestamps
 */
export interface PairSnapshot {
  symbolA: string;
  symbolB: string;
  timeframe: TimeframeId;
  window: number;
  hedge: HedgeRatioResult;
  correlation: ValuePoint[];
  spread: ValuePoint[];
  spreadZscore: ValuePoint[];
  adf: AdfResult;
}

/** Flat numeric variables exposed to alert conditions */
export type AlertContext = Record<string, number>;
