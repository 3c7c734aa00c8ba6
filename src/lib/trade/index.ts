/**
 * Trade Processing Library
 *
 * Tick and bar types, timeframe utilities and tick-to-bar resampling.
 */

// Types
export type {
  Tick,
  OHLCBar,
  CandleState,
  TimeframeId,
  GapFillPolicy,
  ResampleOptions,
  TimeRange,
} from "./types.js";

// Timestamp utilities
export {
  TIMEFRAME_IDS,
  TIMEFRAME_MS,
  isTimeframeId,
  getBucketStart,
} from "./timestamp.js";

// Candle aggregation
export {
  createCandleFromTick,
  updateCandleWithTick,
  addTickToCandle,
  createGapCandle,
  toBar,
} from "./candle-aggregation.js";

// Resampling
export { resample, resampleBySymbol } from "./resampler.js";
