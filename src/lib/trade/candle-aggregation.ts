/**
 * Candle Aggregation
 *
 * Per-bucket OHLCV accumulation shared by the resampler.
 * Ticks must be added in timestamp order so open/close are first/last.
 */

import type { CandleState, OHLCBar, Tick, TimeframeId } from "./types.js";

/**
 * Create a new candle state from the first tick of a bucket
 */
export function createCandleFromTick(tick: Tick): CandleState {
  const { price, size } = tick;

  return {
    open: price,
    high: price,
    low: price,
    close: price,
    volume: size,
    tradeCount: 1,
  };
}

/**
 * Update an existing candle with a later tick
 */
export function updateCandleWithTick(candle: CandleState, tick: Tick): void {
  const { price, size } = tick;

  candle.high = Math.max(candle.high, price);
  candle.low = Math.min(candle.low, price);
  candle.close = price;
  candle.volume += size;
  candle.tradeCount++;
}

/**
 * Add a tick to a candle map, creating a new candle if needed
 *
 * @param candles - Map of bucketStart -> CandleState
 * @param bucketStart - Bucket the tick falls into
 * @param tick - The tick to add
 */
export function addTickToCandle(candles: Map<number, CandleState>, bucketStart: number, tick: Tick): void {
  const existing = candles.get(bucketStart);

  if (existing) {
    updateCandleWithTick(existing, tick);
  } else {
    candles.set(bucketStart, createCandleFromTick(tick));
  }
}

/**
 * Build a flat zero-volume candle at the previous close (gap fill)
 */
export function createGapCandle(previousClose: number): CandleState {
  return {
    open: previousClose,
    high: previousClose,
    low: previousClose,
    close: previousClose,
    volume: 0,
    tradeCount: 0,
  };
}

/**
 * Freeze a candle state into an OHLC bar
 */
export function toBar(symbol: string, timeframe: TimeframeId, bucketStart: number, candle: CandleState): OHLCBar {
  return {
    symbol,
    timeframe,
    bucketStart,
    open: candle.open,
    high: candle.high,
    low: candle.low,
    close: candle.close,
    volume: candle.volume,
    tradeCount: candle.tradeCount,
  };
}
