/**
 * Analytics Library
 *
 * Pure, stateless transformations over time-ordered price/volume series.
 *
 * Categories:
 * 1. Summary: priceStatistics - distribution of a price sample
 * 2. Mean reversion: rollingZScore, adfTest - how stretched, and whether it reverts
 * 3. Pairs: rollingCorrelation, hedgeRatio, spread - relationship between two symbols
 * 4. Risk: returns, rollingVolatility - how much price moves
 * 5. Trend: movingAverage, bollingerBands - where price sits relative to its average
 * 6. Participation: volumeProfile - where volume traded
 *
 * Insufficient or degenerate input never throws; each function documents the
 * sentinel it returns instead.
 */

// Types
export type {
  SeriesPoint,
  ValuePoint,
  PriceStatistics,
  HedgeRatioResult,
  AdfResult,
  CriticalLevel,
  BollingerBands,
  VolumeProfile,
  AnalyticsSnapshot,
  PairSnapshot,
  AlertContext,
} from "./types.js";

// Series helpers
export { closeSeries, volumeSeries, presentValues, innerJoin, rollingApply } from "./series.js";

// Summary statistics
export { mean, sampleStd, quantileSorted, priceStatistics } from "./statistics.js";

// Rolling metrics
export { rollingMean, rollingStd, rollingZScore, rollingCorrelation, pearson } from "./rolling.js";

// Regression
export type { OlsFit } from "./regression.js";
export { fitOls, invertMatrix, hedgeRatio, spread } from "./regression.js";

// Stationarity
export {
  ADF_MIN_OBSERVATIONS,
  ADF_SIGNIFICANCE,
  adfTest,
  mackinnonPValue,
  mackinnonCriticalValues,
  normalCdf,
} from "./adf.js";

// Volatility
export { ANNUALIZATION_PERIODS, returns, rollingVolatility } from "./volatility.js";

// Trend
export { BOLLINGER_WINDOW, BOLLINGER_MULTIPLIER, movingAverage, bollingerBands } from "./bands.js";

// Participation
export { VOLUME_PROFILE_BINS, volumeProfile } from "./volume-profile.js";

// Snapshots
export { buildSnapshot, buildPairSnapshot, toAlertContext, toPairAlertContext } from "./snapshot.js";
