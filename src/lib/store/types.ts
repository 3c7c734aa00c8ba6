/**
 * Storage collaborator consumed by the pipeline
 */

import type { OHLCBar, Tick, TimeframeId, TimeRange } from "../trade/types.js";

export interface TickStore {
  /** Append one tick */
  insertTick(tick: Tick): Promise<void>;

  /**
   * Append ticks
   *
   * @returns Number of rows written
   * @throws StorageError
   */
  insertTicks(ticks: readonly Tick[]): Promise<number>;

  /**
   * Upsert bars keyed by (symbol, timeframe, bucketStart)
   *
   * @returns Number of rows written
   * @throws StorageError
   */
  insertOhlc(bars: readonly OHLCBar[]): Promise<number>;

  /**
   * Ticks for a symbol in ascending time order. With a limit, the most
   * recent `limit` ticks in the range.
   */
  queryTicks(symbol: string, range?: TimeRange, limit?: number): Promise<Tick[]>;

  /** Bars in ascending bucket order */
  queryOhlc(symbol: string, timeframe: TimeframeId, range?: TimeRange): Promise<OHLCBar[]>;

  /** Distinct symbols with stored ticks, sorted */
  listSymbols(): Promise<string[]>;

  /** Stored tick count, for one symbol or all */
  countTicks(symbol?: string): Promise<number>;

  /**
   * Round-trip to the backing store
   *
   * @throws StorageError
   */
  ping(): Promise<void>;

  close(): Promise<void>;
}
