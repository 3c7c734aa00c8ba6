/**
 * Type definitions for tick ingestion and candle aggregation
 */

/**
 * Normalized trade tick.
 * Ordering within a symbol follows feed delivery, not timestamp.
 */
export interface Tick {
  /** Canonical lower-case symbol (e.g., "btcusdt") */
  readonly symbol: string;
  /** Trade time as epoch milliseconds */
  readonly timestamp: number;
  /** Trade price */
  readonly price: number;
  /** Trade size/quantity */
  readonly size: number;
  /** Feed-assigned trade id */
  readonly tradeId?: number;
  /** Feed event time as epoch milliseconds */
  readonly eventTime?: number;
  /** True when the buyer was the passive (maker) side */
  readonly isBuyerMaker?: boolean;
}

/** Supported resampling intervals */
export type TimeframeId = "1s" | "1min" | "5min" | "15min" | "1h" | "1d";

/**
 * One OHLCV bar. Unique per (symbol, timeframe, bucketStart).
 */
export interface OHLCBar {
  symbol: string;
  timeframe: TimeframeId;
  /** Bucket start as epoch milliseconds */
  bucketStart: number;
  open: number;
  high: number;
  low: number;
  close: number;
  /** Sum of tick sizes in the bucket */
  volume: number;
  /** Number of ticks in the bucket (0 for gap-filled bars) */
  tradeCount: number;
}

/**
 * Internal state for a bucket being aggregated
 */
export interface CandleState {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  tradeCount: number;
}

/**
 * How empty buckets between two populated buckets are handled.
 * - carry: emit a flat bar at the previous close with zero volume
 * - none: leave the bucket out (sparse bars)
 */
export type GapFillPolicy = "carry" | "none";

export interface ResampleOptions {
  gapFill?: GapFillPolicy;
}

/** Inclusive time range in epoch milliseconds; open ends are unbounded */
export interface TimeRange {
  start?: number;
  end?: number;
}
