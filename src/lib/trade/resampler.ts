/**
 * Resampler
 *
 * Groups ticks into fixed-width time buckets and produces OHLCV bars.
 *
 * - bucketStart = floor(timestamp / width) * width
 * - Ticks are stably sorted by timestamp, so equal timestamps keep arrival order
 * - Empty buckets between two populated buckets are gap-filled (policy "carry")
 *   or omitted (policy "none"). Nothing is filled before the first populated bucket.
 *
 * Output is a pure function of the input order, so re-running on the same ticks
 * yields identical bars and storage upserts on (symbol, timeframe, bucketStart)
 * stay idempotent.
 */

import type { CandleState, OHLCBar, ResampleOptions, Tick, TimeframeId } from "./types.js";
import { TIMEFRAME_MS, getBucketStart } from "./timestamp.js";
import { addTickToCandle, createGapCandle, toBar } from "./candle-aggregation.js";

/**
 * Resample a single symbol's ticks into OHLCV bars.
 * Mixed-symbol input is not partitioned here; use resampleBySymbol for that.
 */
export function resample(ticks: readonly Tick[], timeframe: TimeframeId, options: ResampleOptions = {}): OHLCBar[] {
  if (ticks.length === 0) return [];

  const gapFill = options.gapFill ?? "carry";
  const widthMs = TIMEFRAME_MS[timeframe];
  const symbol = ticks[0].symbol;

  // Array.prototype.sort is stable
  const sorted = [...ticks].sort((a, b) => a.timestamp - b.timestamp);

  const candles = new Map<number, CandleState>();
  for (const tick of sorted) {
    addTickToCandle(candles, getBucketStart(tick.timestamp, widthMs), tick);
  }

  // Map iteration follows insertion order, which is ascending bucket order here
  const bars: OHLCBar[] = [];
  let previous: { bucketStart: number; close: number } | null = null;

  for (const [bucketStart, candle] of candles) {
    if (previous && gapFill === "carry") {
      for (let gap = previous.bucketStart + widthMs; gap < bucketStart; gap += widthMs) {
        bars.push(toBar(symbol, timeframe, gap, createGapCandle(previous.close)));
      }
    }
    bars.push(toBar(symbol, timeframe, bucketStart, candle));
    previous = { bucketStart, close: candle.close };
  }

  return bars;
}

/**
 * Partition ticks by symbol and resample each partition
 *
 * @returns Map of symbol -> bars
 */
export function resampleBySymbol(
  ticks: readonly Tick[],
  timeframe: TimeframeId,
  options: ResampleOptions = {}
): Map<string, OHLCBar[]> {
  const bySymbol = new Map<string, Tick[]>();
  for (const tick of ticks) {
    const list = bySymbol.get(tick.symbol);
    if (list) {
      list.push(tick);
    } else {
      bySymbol.set(tick.symbol, [tick]);
    }
  }

  const result = new Map<string, OHLCBar[]>();
  for (const [symbol, symbolTicks] of bySymbol) {
    result.set(symbol, resample(symbolTicks, timeframe, options));
  }
  return result;
}
