import { describe, it, expect } from "vitest";
import { binanceFuturesAdapter, normalizeBinanceTrade } from "../normalizer.js";

const RECEIVED_AT = 1_700_000_009_999;

function trade(fields: Record<string, unknown>): string {
  return JSON.stringify({ e: "trade", p: "100.5", q: "2", ...fields });
}

describe("normalizeBinanceTrade", () => {
  it("maps every trade field", () => {
    const raw = JSON.stringify({
      e: "trade",
      E: 1_700_000_000_123,
      s: "BTCUSDT",
      t: 12345,
      p: "40000.50",
      q: "0.100",
      T: 1_700_000_000_120,
      m: true,
    });

    const result = normalizeBinanceTrade(raw, "btcusdt", RECEIVED_AT);

    expect(result).toEqual({
      ok: true,
      value: {
        symbol: "btcusdt",
        timestamp: 1_700_000_000_120,
        price: 40000.5,
        size: 0.1,
        tradeId: 12345,
        eventTime: 1_700_000_000_123,
        isBuyerMaker: true,
      },
    });
  });

  it("falls back from trade time to event time to receive time", () => {
    const withEvent = normalizeBinanceTrade(trade({ E: 1_700_000_000_500 }), "ethusdt", RECEIVED_AT);
    const withNeither = normalizeBinanceTrade(trade({}), "ethusdt", RECEIVED_AT);

    expect(withEvent.ok && withEvent.value.timestamp).toBe(1_700_000_000_500);
    expect(withNeither.ok && withNeither.value.timestamp).toBe(RECEIVED_AT);
  });

  it("uses the subscribing symbol when the message has none", () => {
    const result = normalizeBinanceTrade(trade({}), "ETHUSDT", RECEIVED_AT);
    expect(result.ok && result.value.symbol).toBe("ethusdt");
  });

  it("accepts numeric price and quantity", () => {
    const result = normalizeBinanceTrade(trade({ p: 101.25, q: 3 }), "btcusdt", RECEIVED_AT);
    expect(result.ok && [result.value.price, result.value.size]).toEqual([101.25, 3]);
  });

  it("omits optional fields the message does not carry", () => {
    const result = normalizeBinanceTrade(trade({ T: 1_700_000_000_000 }), "btcusdt", RECEIVED_AT);
    expect(result).toEqual({
      ok: true,
      value: { symbol: "btcusdt", timestamp: 1_700_000_000_000, price: 100.5, size: 2 },
    });
  });

  it("rejects messages that are not JSON", () => {
    const result = normalizeBinanceTrade("{not json", "btcusdt", RECEIVED_AT);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("MALFORMED_MESSAGE");
    expect(result.error.message).toBe("Message is not valid JSON");
  });

  it("rejects other event types", () => {
    const result = normalizeBinanceTrade(JSON.stringify({ result: null, id: 1 }), "btcusdt", RECEIVED_AT);
    expect(result.ok).toBe(false);
    const agg = normalizeBinanceTrade(trade({ e: "aggTrade" }), "btcusdt", RECEIVED_AT);
    expect(agg.ok).toBe(false);
  });

  it("rejects unparseable or negative numbers", () => {
    expect(normalizeBinanceTrade(trade({ p: "abc" }), "btcusdt", RECEIVED_AT).ok).toBe(false);
    expect(normalizeBinanceTrade(trade({ p: "" }), "btcusdt", RECEIVED_AT).ok).toBe(false);
    expect(normalizeBinanceTrade(trade({ q: "-1" }), "btcusdt", RECEIVED_AT).ok).toBe(false);
    expect(normalizeBinanceTrade(trade({ T: "soon" }), "btcusdt", RECEIVED_AT).ok).toBe(false);
  });

  it("names the failing field", () => {
    const result = normalizeBinanceTrade(trade({ q: null }), "btcusdt", RECEIVED_AT);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toMatch(/^Invalid trade message: q: /);
  });
});

describe("binanceFuturesAdapter", () => {
  it("builds one trade stream URL per symbol", () => {
    expect(binanceFuturesAdapter().streamUrl("BTCUSDT")).toBe("wss://fstream.binance.com/ws/btcusdt@trade");
    expect(binanceFuturesAdapter("ws://127.0.0.1:9000/ws/").streamUrl("ethusdt")).toBe("ws://127.0.0.1:9000/ws/ethusdt@trade");
  });
});
