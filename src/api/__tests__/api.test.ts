import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { Server } from "node:http";
import { createApp } from "../../app.js";
import { Pipeline } from "../../pipeline.js";
import { Collector } from "../../stream/collector.js";
import { binanceFuturesAdapter } from "../../stream/normalizer.js";
import type { ConnectOptions, ConnectionState, Connector, FeedConnection } from "../../stream/types.js";
import { MemoryTickStore } from "../../lib/store/memory-store.js";
import { StorageError } from "../../lib/errors.js";

class FakeConnection implements FeedConnection {
  readonly symbol: string;
  state: ConnectionState = "open";
  reconnectAttempts = 0;

  constructor(private readonly options: ConnectOptions) {
    this.symbol = options.symbol;
  }

  trade(price: number, time: number): void {
    this.options.onMessage(JSON.stringify({ e: "trade", s: this.symbol.toUpperCase(), p: String(price), q: "1", T: time }));
  }

  close(): void {
    this.state = "closed";
  }
}

class UnreachableStore extends MemoryTickStore {
  async ping(): Promise<void> {
    throw new StorageError("connection refused");
  }
}

interface Reply {
  status: number;
  headers: Headers;
  body: unknown;
}

describe("HTTP API", () => {
  let server: Server;
  let baseUrl: string;
  let pipeline: Pipeline;
  let store: MemoryTickStore;
  let connections: Map<string, FakeConnection>;

  async function listen(withStore: MemoryTickStore): Promise<void> {
    connections = new Map();
    const connector: Connector = (options) => {
      const connection = new FakeConnection(options);
      connections.set(options.symbol, connection);
      return connection;
    };
    store = withStore;
    pipeline = new Pipeline({
      collector: new Collector({ adapter: binanceFuturesAdapter(), connector, now: () => 0 }),
      store,
      timeframe: "1min",
      window: 2,
      refreshIntervalMs: 60000,
    });

    server = await new Promise<Server>((resolve) => {
      const s = createApp(pipeline).listen(0, "127.0.0.1", () => resolve(s));
    });
    const address = server.address();
    if (typeof address !== "object" || address === null) throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  async function call(path: string, method = "GET", body?: unknown): Promise<Reply> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: res.status, headers: res.headers, body: await res.json() };
  }

  async function seed(symbol: string, prices: number[]): Promise<void> {
    await store.insertTicks(prices.map((price, i) => ({ symbol, timestamp: i * 60000, price, size: 1 })));
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    await listen(new MemoryTickStore());
  });

  afterEach(async () => {
    await pipeline.stop();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    vi.restoreAllMocks();
  });

  describe("health", () => {
    it("reports healthy with collector state", async () => {
      const reply = await call("/health");
      expect(reply.status).toBe(200);
      expect(reply.body).toMatchObject({
        status: "healthy",
        database: "connected",
        collector: { running: false, symbols: [], connections: [], pending: 0 },
      });
    });

    it("reports unhealthy when the store cannot be reached", async () => {
      await pipeline.stop();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await listen(new UnreachableStore());

      const reply = await call("/health");
      expect(reply.status).toBe(503);
      expect(reply.body).toMatchObject({ status: "unhealthy", database: "disconnected", error: "connection refused" });
    });
  });

  describe("collector", () => {
    it("starts once and stops once", async () => {
      const started = await call("/collector/start", "POST", { symbols: ["BTCUSDT", "ethusdt"] });
      expect(started.status).toBe(200);
      expect(started.body).toMatchObject({ success: true, collector: { running: true, symbols: ["btcusdt", "ethusdt"] } });

      const again = await call("/collector/start", "POST", { symbols: ["solusdt"] });
      expect(again.status).toBe(409);
      expect(again.body).toMatchObject({ success: false, error: "ALREADY_RUNNING" });

      const stopped = await call("/collector/stop", "POST");
      expect(stopped.status).toBe(200);
      expect(stopped.body).toMatchObject({ success: true, flushed: 0, collector: { running: false } });

      const stoppedAgain = await call("/collector/stop", "POST");
      expect(stoppedAgain.status).toBe(409);
      expect(stoppedAgain.body).toMatchObject({ success: false, error: "NOT_RUNNING" });
    });

    it("rejects an empty symbol list", async () => {
      const reply = await call("/collector/start", "POST", { symbols: [] });
      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ success: false, error: "Invalid request", issues: [{ path: "symbols" }] });
    });

    it("reads the buffer and clears it on request", async () => {
      await call("/collector/start", "POST", { symbols: ["btcusdt"] });
      connections.get("btcusdt")?.trade(100, 1000);

      const peek = await call("/collector/buffer");
      expect(peek.body).toMatchObject({ count: 1, cleared: false, ticks: [{ symbol: "btcusdt", price: 100, timestamp: 1000 }] });
      expect(pipeline.collector.pendingCount()).toBe(1);

      const drained = await call("/collector/buffer?clear=true");
      expect(drained.body).toMatchObject({ count: 1, cleared: true });
      expect(pipeline.collector.pendingCount()).toBe(0);

      const invalid = await call("/collector/buffer?clear=yes");
      expect(invalid.status).toBe(400);
    });
  });

  describe("stored data", () => {
    it("returns the most recent ticks oldest first", async () => {
      await seed("btcusdt", [1, 2, 3]);

      const reply = await call("/ticks/BTCUSDT?limit=2");
      expect(reply.status).toBe(200);
      expect(reply.body).toMatchObject({ symbol: "btcusdt", count: 2, ticks: [{ price: 2 }, { price: 3 }] });
    });

    it("rejects an inverted range", async () => {
      const reply = await call("/ticks/btcusdt?start=5000&end=1000");
      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ issues: [{ path: "start", message: "start must not be after end" }] });
    });

    it("returns bars as tuples after resampling", async () => {
      await seed("btcusdt", [10, 11]);

      const reply = await call("/ohlc/btcusdt?refresh=true");
      expect(reply.status).toBe(200);
      expect(reply.headers.get("x-timeframe")).toBe("1min");
      expect(reply.body).toEqual([
        [0, 10, 10, 10, 10, 1],
        [60000, 11, 11, 11, 11, 1],
      ]);

      const stale = await call("/ohlc/btcusdt?timeframe=5min");
      expect(stale.body).toEqual([]);
    });

    it("rejects unknown timeframes", async () => {
      const reply = await call("/ohlc/btcusdt?timeframe=2min");
      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ issues: [{ path: "timeframe" }] });
    });

    it("lists collected and stored symbols", async () => {
      await seed("ethusdt", [1]);
      await call("/collector/start", "POST", { symbols: ["btcusdt"] });

      const reply = await call("/symbols");
      expect(reply.body).toEqual({ success: true, collecting: ["btcusdt"], stored: ["ethusdt"] });
    });
  });

  describe("analytics", () => {
    it("computes a symbol snapshot", async () => {
      await seed("btcusdt", [10, 11, 12]);

      const reply = await call("/analytics/btcusdt");
      expect(reply.status).toBe(200);
      expect(reply.body).toMatchObject({
        success: true,
        symbol: "btcusdt",
        timeframe: "1min",
        window: 2,
        barCount: 3,
        variables: { price: 12, bars: 3, zscore: expect.closeTo(Math.SQRT1_2, 10) },
        bands: { upper: [], middle: [], lower: [] },
      });
    });

    it("returns 404 for a symbol without ticks", async () => {
      const reply = await call("/analytics/solusdt");
      expect(reply.status).toBe(404);
    });

    it("rejects a window below 2", async () => {
      const reply = await call("/analytics/btcusdt?window=1");
      expect(reply.status).toBe(400);
    });

    it("computes pair analytics", async () => {
      await seed("btcusdt", [10, 11, 12]);
      await seed("ethusdt", [20, 22, 24]);

      const reply = await call("/analytics/pair?a=btcusdt&b=ETHUSDT");
      expect(reply.status).toBe(200);
      expect(reply.body).toMatchObject({
        symbolA: "btcusdt",
        symbolB: "ethusdt",
        hedge: { hedgeRatio: expect.closeTo(0.5, 10) },
        variables: { correlation: expect.closeTo(1, 10) },
      });
    });

    it("rejects a pair of the same symbol", async () => {
      const reply = await call("/analytics/pair?a=btcusdt&b=btcusdt");
      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ issues: [{ path: "b", message: "a and b must be different symbols" }] });
    });
  });

  describe("alerts", () => {
    it("adds, triggers, resets and deletes a rule", async () => {
      const added = await call("/alerts", "POST", { condition: "price > 11", symbol: "BTCUSDT" });
      expect(added.status).toBe(201);
      expect(added.body).toMatchObject({ success: true, rule: { id: 1, condition: "price > 11", symbol: "btcusdt", triggered: false } });

      await seed("btcusdt", [10, 11, 12]);
      await pipeline.refreshSymbol("btcusdt");

      const listed = await call("/alerts");
      expect(listed.body).toMatchObject({ rules: [{ id: 1, triggered: true, triggerCount: 1 }] });

      const history = await call("/alerts/history?limit=5");
      expect(history.body).toMatchObject({ count: 1, events: [{ ruleId: 1, symbol: "btcusdt", context: { price: 12 } }] });

      const reset = await call("/alerts/1/reset", "POST");
      expect(reset.body).toMatchObject({ success: true, rule: { id: 1, triggered: false, triggerCount: 1 } });

      const deleted = await call("/alerts/1", "DELETE");
      expect(deleted.body).toEqual({ success: true, id: 1 });
      expect((await call("/alerts/1", "DELETE")).status).toBe(404);
    });

    it("reports where a condition fails to parse", async () => {
      const reply = await call("/alerts", "POST", { condition: "price >" });
      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ success: false, error: "INVALID_CONDITION", position: 7 });
    });

    it("rejects a body without a condition", async () => {
      const reply = await call("/alerts", "POST", {});
      expect(reply.status).toBe(400);
      expect(reply.body).toMatchObject({ error: "Invalid request", issues: [{ path: "condition" }] });
    });

    it("validates and resolves rule ids", async () => {
      expect((await call("/alerts/9/reset", "POST")).status).toBe(404);
      expect((await call("/alerts/abc/reset", "POST")).status).toBe(400);
    });

    it("resets every rule", async () => {
      await call("/alerts", "POST", { condition: "price > 0" });
      await seed("btcusdt", [1]);
      await pipeline.refreshSymbol("btcusdt");

      const reply = await call("/alerts/reset", "POST");
      expect(reply.body).toMatchObject({ success: true, rules: [{ id: 1, triggered: false }] });
    });
  });

  it("reports pipeline stats", async () => {
    await seed("btcusdt", [1, 2]);
    await call("/alerts", "POST", { condition: "price > 0" });

    const reply = await call("/stats");
    expect(reply.body).toMatchObject({
      success: true,
      stats: { storedTicks: 2, flushedTicks: 0, cycles: 0, rules: 1, timeframe: "1min", window: 2 },
    });
  });
});
