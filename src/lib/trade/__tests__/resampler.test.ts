import { describe, it, expect } from "vitest";
import { resample, resampleBySymbol } from "../resampler.js";
import { getBucketStart } from "../timestamp.js";
import type { Tick } from "../types.js";

const T0 = Date.UTC(2024, 0, 15, 14, 30, 0);

function tick(offsetMs: number, price: number, size = 1, symbol = "btcusdt"): Tick {
  return { symbol, timestamp: T0 + offsetMs, price, size };
}

describe("resample", () => {
  it("returns no bars for no ticks", () => {
    expect(resample([], "1min")).toEqual([]);
  });

  it("aggregates ticks in one bucket into OHLCV", () => {
    const bars = resample([tick(1_000, 100, 2), tick(20_000, 105, 1), tick(40_000, 98, 3), tick(59_999, 101, 0.5)], "1min");

    expect(bars).toEqual([
      {
        symbol: "btcusdt",
        timeframe: "1min",
        bucketStart: T0,
        open: 100,
        high: 105,
        low: 98,
        close: 101,
        volume: 6.5,
        tradeCount: 4,
      },
    ]);
  });

  it("sorts unsorted ticks by timestamp before taking open and close", () => {
    const bars = resample([tick(30_000, 110), tick(5_000, 100), tick(50_000, 120)], "1min");

    expect(bars).toHaveLength(1);
    expect(bars[0].open).toBe(100);
    expect(bars[0].close).toBe(120);
  });

  it("keeps arrival order for ticks sharing a timestamp", () => {
    const bars = resample([tick(10_000, 100), tick(10_000, 200), tick(10_000, 150)], "1min");

    expect(bars[0].open).toBe(100);
    expect(bars[0].close).toBe(150);
    expect(bars[0].high).toBe(200);
  });

  it("places every tick in floor(ts / T) * T and sums volume per bucket exactly", () => {
    const ticks = [tick(-1, 1, 0.1), tick(0, 2, 0.2), tick(299_999, 3, 0.3), tick(300_000, 4, 0.4), tick(612_345, 5, 0.5)];
    const widthMs = 5 * 60 * 1000;
    const bars = resample(ticks, "5min", { gapFill: "none" });

    for (const t of ticks) {
      const bucket = getBucketStart(t.timestamp, widthMs);
      const bar = bars.find((b) => b.bucketStart === bucket);
      expect(bar).toBeDefined();
    }
    expect(bars.map((b) => b.bucketStart)).toEqual([T0 - widthMs, T0, T0 + widthMs, T0 + 2 * widthMs]);
    expect(bars.map((b) => b.volume)).toEqual([0.1, 0.2 + 0.3, 0.4, 0.5]);
  });

  it("carries the previous close through empty buckets", () => {
    const bars = resample([tick(0, 100, 1), tick(10_000, 102, 1), tick(180_000, 110, 2)], "1min");

    expect(bars.map((b) => b.bucketStart)).toEqual([T0, T0 + 60_000, T0 + 120_000, T0 + 180_000]);

    for (const filled of bars.slice(1, 3)) {
      expect(filled.open).toBe(102);
      expect(filled.high).toBe(102);
      expect(filled.low).toBe(102);
      expect(filled.close).toBe(102);
      expect(filled.volume).toBe(0);
      expect(filled.tradeCount).toBe(0);
    }
    expect(bars[3].open).toBe(110);
  });

  it("leaves empty buckets out when gap fill is disabled", () => {
    const bars = resample([tick(0, 100), tick(180_000, 110)], "1min", { gapFill: "none" });

    expect(bars.map((b) => b.bucketStart)).toEqual([T0, T0 + 180_000]);
  });

  it("never fills before the first populated bucket", () => {
    const bars = resample([tick(3_600_000, 100)], "1min");

    expect(bars).toHaveLength(1);
    expect(bars[0].bucketStart).toBe(T0 + 3_600_000);
  });

  it("is deterministic for identical input", () => {
    const ticks = [tick(70_000, 3), tick(1_000, 1, 0.1), tick(200_000, 7, 0.7), tick(1_000, 2, 0.2)];

    expect(resample(ticks, "1min")).toEqual(resample(ticks, "1min"));
  });

  it("does not mutate the input order", () => {
    const ticks = [tick(2_000, 2), tick(1_000, 1)];
    resample(ticks, "1s");

    expect(ticks.map((t) => t.price)).toEqual([2, 1]);
  });
});

describe("resampleBySymbol", () => {
  it("resamples each symbol separately", () => {
    const result = resampleBySymbol([tick(0, 100, 1, "btcusdt"), tick(1_000, 10, 5, "ethusdt"), tick(2_000, 101, 1, "btcusdt")], "1min");

    expect([...result.keys()]).toEqual(["btcusdt", "ethusdt"]);
    expect(result.get("btcusdt")?.[0].tradeCount).toBe(2);
    expect(result.get("ethusdt")?.[0].volume).toBe(5);
  });
});
