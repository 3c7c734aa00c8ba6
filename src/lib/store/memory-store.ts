/**
 * In-memory Tick Store
 *
 * Same contract as the Postgres store, held in process. Used when no
 * database is configured, and as the store in tests.
 */

import type { OHLCBar, Tick, TimeframeId, TimeRange } from "../trade/types.js";
import type { TickStore } from "./types.js";

function inRange(time: number, range: TimeRange | undefined): boolean {
  if (range?.start !== undefined && time < range.start) return false;
  if (range?.end !== undefined && time > range.end) return false;
  return true;
}

function barKey(bar: Pick<OHLCBar, "symbol" | "timeframe" | "bucketStart">): string {
  return `${bar.symbol}|${bar.timeframe}|${bar.bucketStart}`;
}

export class MemoryTickStore implements TickStore {
  private readonly ticks = new Map<string, Tick[]>();
  private readonly bars = new Map<string, OHLCBar>();

  async insertTick(tick: Tick): Promise<void> {
    await this.insertTicks([tick]);
  }

  async insertTicks(ticks: readonly Tick[]): Promise<number> {
    for (const tick of ticks) {
      const list = this.ticks.get(tick.symbol);
      if (list) list.push(tick);
      else this.ticks.set(tick.symbol, [tick]);
    }
    return ticks.length;
  }

  async insertOhlc(bars: readonly OHLCBar[]): Promise<number> {
    for (const bar of bars) this.bars.set(barKey(bar), { ...bar });
    return bars.length;
  }

  async queryTicks(symbol: string, range?: TimeRange, limit?: number): Promise<Tick[]> {
    // Stable sort keeps insertion order for equal timestamps
    const matching = (this.ticks.get(symbol) ?? [])
      .filter((tick) => inRange(tick.timestamp, range))
      .sort((a, b) => a.timestamp - b.timestamp);
    return limit !== undefined ? matching.slice(Math.max(0, matching.length - limit)) : matching;
  }

  async queryOhlc(symbol: string, timeframe: TimeframeId, range?: TimeRange): Promise<OHLCBar[]> {
    return [...this.bars.values()]
      .filter((bar) => bar.symbol === symbol && bar.timeframe === timeframe && inRange(bar.bucketStart, range))
      .sort((a, b) => a.bucketStart - b.bucketStart)
      .map((bar) => ({ ...bar }));
  }

  async listSymbols(): Promise<string[]> {
    return [...this.ticks.keys()].sort();
  }

  async countTicks(symbol?: string): Promise<number> {
    if (symbol !== undefined) return this.ticks.get(symbol)?.length ?? 0;
    let total = 0;
    for (const list of this.ticks.values()) total += list.length;
    return total;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.ticks.clear();
    this.bars.clear();
  }
}
