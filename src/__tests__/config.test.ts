import { afterEach, describe, it, expect, vi } from "vitest";
import { parseConfig, reportConfigError } from "../config.js";

describe("parseConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("applies defaults when nothing is set", () => {
    const result = parseConfig({});
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value).toEqual({
      PORT: 8080,
      FEED_WS_URL: "wss://fstream.binance.com/ws",
      SYMBOLS: ["btcusdt", "ethusdt"],
      DEFAULT_TIMEFRAME: "1min",
      ANALYTICS_WINDOW: 60,
      REFRESH_INTERVAL_MS: 5000,
      BUFFER_CAPACITY: 100000,
      BUFFER_OVERFLOW: "evict-oldest",
      GAP_FILL: "carry",
      RECONNECT_INITIAL_DELAY_MS: 1000,
      RECONNECT_MAX_DELAY_MS: 30000,
      RECONNECT_MAX_ATTEMPTS: 0,
      TICK_QUERY_LIMIT: 10000,
      AUTO_START: true,
    });
  });

  it("coerces strings and treats empty values as unset", () => {
    const result = parseConfig({
      PORT: "3001",
      POSTGRES_URL: "",
      SYMBOLS: " BTCUSDT , solusdt,, ",
      DEFAULT_TIMEFRAME: "5min",
      GAP_FILL: "none",
      AUTO_START: "0",
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.PORT).toBe(3001);
    expect(result.value.POSTGRES_URL).toBeUndefined();
    expect(result.value.SYMBOLS).toEqual(["btcusdt", "solusdt"]);
    expect(result.value.DEFAULT_TIMEFRAME).toBe("5min");
    expect(result.value.GAP_FILL).toBe("none");
    expect(result.value.AUTO_START).toBe(false);
  });

  it("rejects invalid values", () => {
    const result = parseConfig({ DEFAULT_TIMEFRAME: "2min", ANALYTICS_WINDOW: "1" });
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error.issues.map((issue) => issue.path.join("."))).toEqual(["DEFAULT_TIMEFRAME", "ANALYTICS_WINDOW"]);
  });

  it("rejects a max reconnect delay below the initial delay", () => {
    const result = parseConfig({ RECONNECT_INITIAL_DELAY_MS: "5000", RECONNECT_MAX_DELAY_MS: "1000" });
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error.issues[0].path).toEqual(["RECONNECT_MAX_DELAY_MS"]);
  });

  it("reports each issue on its own line", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const result = parseConfig({ PORT: "abc" });
    if (result.ok) throw new Error("expected failure");

    reportConfigError(result.error);
    expect(error).toHaveBeenCalledWith("❌ Invalid configuration");
    expect(error).toHaveBeenCalledWith("   PORT: Expected number, received nan");
  });
});
