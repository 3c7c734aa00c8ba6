/**
 * Tick Analytics Pipeline
 *
 * Wires one collector, one store and one alert engine together:
 *
 *   feed -> Collector (buffer) -> flush -> TickStore (ticks)
 *                                          |
 *            resample recent ticks -> upsert -> TickStore (bars)
 *                                          |
 *                        stored bars -> snapshot -> AlertEngine
 *
 * Each cycle flushes buffered ticks, then refreshes every collected symbol.
 * When two or more symbols are collected, the pair variables of the first
 * two (hedge ratio, spread z-score, correlation) are merged into every
 * symbol's alert context.
 */

import { resample, type GapFillPolicy, type OHLCBar, type TimeframeId, type TimeRange } from "./lib/trade/index.js";
import {
  buildPairSnapshot,
  buildSnapshot,
  toAlertContext,
  toPairAlertContext,
  type AlertContext,
  type AnalyticsSnapshot,
  type PairSnapshot,
} from "./lib/analytics/index.js";
import { AlertEngine, type AlertEvent } from "./lib/alerts/index.js";
import type { TickStore } from "./lib/store/index.js";
import type { Collector, CollectorStatus } from "./stream/index.js";
import { errorMessage, type CollectorError, type Result } from "./lib/errors.js";

export const DEFAULT_WINDOW = 60;
export const DEFAULT_REFRESH_INTERVAL_MS = 5000;
export const DEFAULT_TICK_QUERY_LIMIT = 10_000;

export interface PipelineOptions {
  collector: Collector;
  store: TickStore;
  alerts?: AlertEngine;
  /** Timeframe used by the periodic cycle */
  timeframe?: TimeframeId;
  /** Rolling window in bars used by the periodic cycle */
  window?: number;
  gapFill?: GapFillPolicy;
  /** Most recent ticks read per symbol when resampling */
  tickQueryLimit?: number;
  refreshIntervalMs?: number;
}

export interface SymbolRefresh {
  symbol: string;
  bars: OHLCBar[];
  snapshot: AnalyticsSnapshot;
  context: AlertContext;
  triggered: AlertEvent[];
}

export interface CycleResult {
  flushed: number;
  refreshed: SymbolRefresh[];
  pair: PairSnapshot | null;
}

export interface PipelineStats {
  collector: CollectorStatus;
  storedTicks: number;
  flushedTicks: number;
  failedFlushes: number;
  cycles: number;
  lastCycleAt: string | null;
  timeframe: TimeframeId;
  window: number;
  refreshIntervalMs: number;
  rules: number;
  triggeredRules: number;
  alertHistory: number;
}

export class Pipeline {
  readonly collector: Collector;
  readonly store: TickStore;
  readonly alerts: AlertEngine;
  readonly timeframe: TimeframeId;
  readonly window: number;
  readonly gapFill: GapFillPolicy;
  readonly tickQueryLimit: number;
  readonly refreshIntervalMs: number;

  private timer: NodeJS.Timeout | null = null;
  private flushing: Promise<number> = Promise.resolve(0);
  private cycleRunning = false;

  private flushedTicks = 0;
  private failedFlushes = 0;
  private cycles = 0;
  private lastCycleAt: number | null = null;

  constructor(options: PipelineOptions) {
    this.collector = options.collector;
    this.store = options.store;
    this.alerts = options.alerts ?? new AlertEngine();
    this.timeframe = options.timeframe ?? "1min";
    this.window = options.window ?? DEFAULT_WINDOW;
    this.gapFill = options.gapFill ?? "carry";
    this.tickQueryLimit = options.tickQueryLimit ?? DEFAULT_TICK_QUERY_LIMIT;
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
  }

  get isRunning(): boolean {
    return this.collector.isRunning;
  }

  /**
   * Start collecting and schedule the periodic cycle
   */
  start(symbols: readonly string[]): Result<void, CollectorError> {
    const started = this.collector.start(symbols);
    if (!started.ok) return started;

    this.timer = setInterval(() => {
      this.runCycle().catch((error: unknown) => {
        console.error(`❌ Pipeline cycle failed: ${errorMessage(error)}`);
      });
    }, this.refreshIntervalMs);

    console.log(`🔄 Refreshing ${this.timeframe} analytics every ${this.refreshIntervalMs}ms (window ${this.window})`);
    return started;
  }

  /**
   * Stop collecting, cancel the cycle and write whatever is still buffered
   *
   * @returns Number of ticks written by the final flush
   */
  async stop(): Promise<number> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.collector.stop();
    const flushed = await this.flush();
    if (this.collector.pendingCount() > 0) {
      console.error(`❌ ${this.collector.pendingCount()} tick(s) could not be written on shutdown`);
    }
    return flushed;
  }

  /**
   * Drain the buffer into the store. Calls are serialized; a failed write
   * puts the drained ticks back at the front of the buffer for the next flush.
   *
   * @returns Number of ticks written
   */
  flush(): Promise<number> {
    this.flushing = this.flushing.then(() => this.writePending());
    return this.flushing;
  }

  /**
   * Read a symbol's most recent ticks, resample them and upsert the bars.
   * When the read hits the tick limit, the oldest bucket is cut short and is
   * left out so the stored bar for it is not overwritten.
   *
   * @returns Bars written
   */
  async resampleSymbol(symbol: string, timeframe: TimeframeId = this.timeframe, range?: TimeRange): Promise<OHLCBar[]> {
    const ticks = await this.store.queryTicks(symbol.toLowerCase(), range, this.tickQueryLimit);
    const resampled = resample(ticks, timeframe, { gapFill: this.gapFill });
    const bars = ticks.length >= this.tickQueryLimit ? resampled.slice(1) : resampled;
    if (bars.length > 0) await this.store.insertOhlc(bars);
    return bars;
  }

  /**
   * Bring a symbol's stored bars up to date and read them back in full
   */
  async loadBars(symbol: string, timeframe: TimeframeId = this.timeframe): Promise<OHLCBar[]> {
    const canonical = symbol.toLowerCase();
    await this.resampleSymbol(canonical, timeframe);
    return this.store.queryOhlc(canonical, timeframe);
  }

  /**
   * Compute a symbol's analytics over its stored bars without evaluating alerts
   */
  async analyzeSymbol(
    symbol: string,
    timeframe: TimeframeId = this.timeframe,
    window: number = this.window
  ): Promise<{ bars: OHLCBar[]; snapshot: AnalyticsSnapshot }> {
    const canonical = symbol.toLowerCase();
    const bars = await this.loadBars(canonical, timeframe);
    return { bars, snapshot: buildSnapshot(canonical, timeframe, bars, window) };
  }

  /**
   * Resample a symbol, compute its analytics and evaluate alerts against them
   *
   * @param extraContext - Variables merged into the symbol's alert context
   */
  async refreshSymbol(
    symbol: string,
    timeframe: TimeframeId = this.timeframe,
    window: number = this.window,
    extraContext: AlertContext = {}
  ): Promise<SymbolRefresh> {
    const { bars, snapshot } = await this.analyzeSymbol(symbol, timeframe, window);
    return this.evaluate(snapshot.symbol, bars, snapshot, extraContext);
  }

  /**
   * Pair analytics between two symbols' bars
   */
  async pairSnapshot(
    symbolA: string,
    symbolB: string,
    timeframe: TimeframeId = this.timeframe,
    window: number = this.window
  ): Promise<PairSnapshot> {
    const a = symbolA.toLowerCase();
    const b = symbolB.toLowerCase();
    const [barsA, barsB] = await Promise.all([this.loadBars(a, timeframe), this.loadBars(b, timeframe)]);
    return buildPairSnapshot(a, b, timeframe, barsA, barsB, window);
  }

  /**
   * One flush + refresh pass over every collected symbol.
   * A cycle requested while another is running is skipped (returns null).
   */
  async runCycle(): Promise<CycleResult | null> {
    if (this.cycleRunning) {
      console.warn("⚠️ Previous cycle still running, skipping");
      return null;
    }
    this.cycleRunning = true;

    try {
      const flushed = await this.flush();
      const symbols = this.collector.status().symbols;

      const barsBySymbol = new Map<string, OHLCBar[]>();
      for (const symbol of symbols) {
        try {
          barsBySymbol.set(symbol, await this.loadBars(symbol));
        } catch (error) {
          console.error(`❌ [${symbol}] Resample failed: ${errorMessage(error)}`);
        }
      }

      let pair: PairSnapshot | null = null;
      let pairContext: AlertContext = {};
      if (symbols.length >= 2) {
        const barsA = barsBySymbol.get(symbols[0]);
        const barsB = barsBySymbol.get(symbols[1]);
        if (barsA && barsB) {
          pair = buildPairSnapshot(symbols[0], symbols[1], this.timeframe, barsA, barsB, this.window);
          pairContext = toPairAlertContext(pair);
        }
      }

      const refreshed: SymbolRefresh[] = [];
      for (const [symbol, bars] of barsBySymbol) {
        const snapshot = buildSnapshot(symbol, this.timeframe, bars, this.window);
        refreshed.push(this.evaluate(symbol, bars, snapshot, pairContext));
      }

      this.cycles++;
      this.lastCycleAt = Date.now();
      return { flushed, refreshed, pair };
    } finally {
      this.cycleRunning = false;
    }
  }

  async stats(): Promise<PipelineStats> {
    const rules = this.alerts.listRules();
    return {
      collector: this.collector.status(),
      storedTicks: await this.store.countTicks(),
      flushedTicks: this.flushedTicks,
      failedFlushes: this.failedFlushes,
      cycles: this.cycles,
      lastCycleAt: this.lastCycleAt !== null ? new Date(this.lastCycleAt).toISOString() : null,
      timeframe: this.timeframe,
      window: this.window,
      refreshIntervalMs: this.refreshIntervalMs,
      rules: rules.length,
      triggeredRules: rules.filter((rule) => rule.triggered).length,
      alertHistory: this.alerts.history(Number.MAX_SAFE_INTEGER).length,
    };
  }

  private evaluate(
    symbol: string,
    bars: OHLCBar[],
    snapshot: AnalyticsSnapshot,
    extraContext: AlertContext
  ): SymbolRefresh {
    const context: AlertContext = { ...toAlertContext(snapshot), ...extraContext };
    const triggered = this.alerts.evaluate(context, symbol);
    return { symbol, bars, snapshot, context, triggered };
  }

  private async writePending(): Promise<number> {
    const ticks = this.collector.drain(true);
    if (ticks.length === 0) return 0;

    try {
      const written = await this.store.insertTicks(ticks);
      this.flushedTicks += written;
      return written;
    } catch (error) {
      this.collector.requeue(ticks);
      this.failedFlushes++;
      console.warn(
        `⚠️ Tick write failed (${errorMessage(error)}), ${this.collector.pendingCount()} tick(s) queued for retry`
      );
      return 0;
    }
  }
}
