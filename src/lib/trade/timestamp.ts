/**
 * Timestamp Utilities
 *
 * Timeframe lookup and bucket calculations for epoch-millisecond timestamps.
 */

import type { TimeframeId } from "./types.js";

/** Timeframe ids, smallest first */
export const TIMEFRAME_IDS = ["1s", "1min", "5min", "15min", "1h", "1d"] as const satisfies readonly TimeframeId[];

/** Bucket width in milliseconds per timeframe */
export const TIMEFRAME_MS: Record<TimeframeId, number> = {
  "1s": 1000,
  "1min": 60 * 1000,
  "5min": 5 * 60 * 1000,
  "15min": 15 * 60 * 1000,
  "1h": 60 * 60 * 1000,
  "1d": 24 * 60 * 60 * 1000,
};

/**
 * Type guard for timeframe ids coming from config or query strings
 */
export function isTimeframeId(value: string): value is TimeframeId {
  return TIMEFRAME_IDS.some((id) => id === value);
}

/**
 * Get the start of the bucket containing a timestamp
 *
 * bucketStart = floor(timestamp / width) * width
 *
 * @param timestampMs - Epoch milliseconds
 * @param widthMs - Bucket width in milliseconds
 */
export function getBucketStart(timestampMs: number, widthMs: number): number {
  return Math.floor(timestampMs / widthMs) * widthMs;
}
