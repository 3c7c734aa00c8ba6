import { describe, it, expect } from "vitest";
import { MemoryTickStore } from "../memory-store.js";
import type { OHLCBar, Tick } from "../../trade/types.js";

const tick = (symbol: string, timestamp: number, price: number): Tick => ({ symbol, timestamp, price, size: 1 });

const bar = (bucketStart: number, close: number): OHLCBar => ({
  symbol: "btcusdt",
  timeframe: "1min",
  bucketStart,
  open: close,
  high: close,
  low: close,
  close,
  volume: 1,
  tradeCount: 1,
});

describe("MemoryTickStore", () => {
  it("returns ticks oldest first within the range", async () => {
    const store = new MemoryTickStore();
    await store.insertTicks([tick("btcusdt", 3000, 3), tick("btcusdt", 1000, 1), tick("btcusdt", 2000, 2)]);

    expect((await store.queryTicks("btcusdt")).map((t) => t.price)).toEqual([1, 2, 3]);
    expect((await store.queryTicks("btcusdt", { start: 2000 })).map((t) => t.price)).toEqual([2, 3]);
    expect((await store.queryTicks("btcusdt", { end: 2000 })).map((t) => t.price)).toEqual([1, 2]);
  });

  it("limits to the most recent ticks", async () => {
    const store = new MemoryTickStore();
    await store.insertTicks([1, 2, 3, 4].map((n) => tick("btcusdt", n * 1000, n)));

    expect((await store.queryTicks("btcusdt", undefined, 2)).map((t) => t.price)).toEqual([3, 4]);
  });

  it("upserts bars on symbol, timeframe and bucket", async () => {
    const store = new MemoryTickStore();
    await store.insertOhlc([bar(60000, 2), bar(0, 1)]);
    await store.insertOhlc([bar(60000, 5)]);

    const bars = await store.queryOhlc("btcusdt", "1min");
    expect(bars.map((b) => [b.bucketStart, b.close])).toEqual([
      [0, 1],
      [60000, 5],
    ]);
    expect(await store.queryOhlc("btcusdt", "5min")).toEqual([]);
  });

  it("lists symbols and counts ticks", async () => {
    const store = new MemoryTickStore();
    await store.insertTicks([tick("ethusdt", 1, 1), tick("btcusdt", 1, 1), tick("ethusdt", 2, 1)]);

    expect(await store.listSymbols()).toEqual(["btcusdt", "ethusdt"]);
    expect(await store.countTicks("ethusdt")).toBe(2);
    expect(await store.countTicks("solusdt")).toBe(0);
    expect(await store.countTicks()).toBe(3);
  });

  it("appends single ticks", async () => {
    const store = new MemoryTickStore();
    await store.insertTick(tick("btcusdt", 2000, 2));
    await store.insertTick(tick("btcusdt", 1000, 1));

    expect((await store.queryTicks("btcusdt")).map((t) => t.price)).toEqual([1, 2]);
  });

  it("drops everything on close", async () => {
    const store = new MemoryTickStore();
    await store.insertTicks([tick("btcusdt", 1, 1)]);
    await store.insertOhlc([bar(0, 1)]);
    await store.close();

    expect(await store.countTicks()).toBe(0);
    expect(await store.queryOhlc("btcusdt", "1min")).toEqual([]);
  });
});
