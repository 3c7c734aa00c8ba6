/**
 * Tick Collector
 *
 * Owns one feed connection per subscribed symbol and fans every tick into a
 * shared bounded buffer. Consumers registered with onTick see each tick as
 * it arrives; the pipeline drains the buffer on its own schedule.
 *
 * Message handling runs to completion on the event loop, so a drain and a
 * push can never interleave. A malformed message, a throwing consumer or a
 * dropped connection only affects the message or symbol it belongs to.
 */

import type { Tick } from "../lib/trade/types.js";
import { CollectorError, err, errorMessage, ok, type Result } from "../lib/errors.js";
import { TickBuffer, DEFAULT_BUFFER_CAPACITY } from "./tick-buffer.js";
import { wsConnector } from "./connection.js";
import {
  DEFAULT_RECONNECT_POLICY,
  type CollectorStatus,
  type Connector,
  type FeedAdapter,
  type FeedConnection,
  type OverflowPolicy,
  type ReconnectPolicy,
  type TickConsumer,
} from "./types.js";

// Log the first few ticks to confirm data is flowing, then summarize periodically
const INITIAL_TICKS_LOGGED = 5;
const SUMMARY_INTERVAL_MS = 30000;

// Log the first few malformed messages, then every Nth
const MALFORMED_LOG_FIRST = 3;
const MALFORMED_LOG_EVERY = 100;

export interface CollectorOptions {
  adapter: FeedAdapter;
  /** Opens connections; defaults to WebSocket */
  connector?: Connector;
  bufferCapacity?: number;
  overflowPolicy?: OverflowPolicy;
  reconnect?: ReconnectPolicy;
  /** Clock (epoch ms) for receive-time fallback and log throttling */
  now?: () => number;
}

interface SymbolCounters {
  received: number;
  malformed: number;
}

/**
 * Lower-case, trim and de-duplicate a symbol list, preserving order
 */
export function canonicalSymbols(symbols: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const raw of symbols) {
    const symbol = raw.trim().toLowerCase();
    if (symbol) seen.add(symbol);
  }
  return [...seen];
}

export class Collector {
  private readonly adapter: FeedAdapter;
  private readonly connector: Connector;
  private readonly reconnect: ReconnectPolicy;
  private readonly now: () => number;
  private readonly buffer: TickBuffer;
  private readonly consumers = new Set<TickConsumer>();

  private running = false;
  private symbols: string[] = [];
  private connections: FeedConnection[] = [];
  private counters = new Map<string, SymbolCounters>();

  private received = 0;
  private malformed = 0;
  private lastSummaryAt = 0;
  private receivedAtLastSummary = 0;

  constructor(options: CollectorOptions) {
    this.adapter = options.adapter;
    this.connector = options.connector ?? wsConnector;
    this.reconnect = options.reconnect ?? DEFAULT_RECONNECT_POLICY;
    this.now = options.now ?? Date.now;
    this.buffer = new TickBuffer(options.bufferCapacity ?? DEFAULT_BUFFER_CAPACITY, options.overflowPolicy ?? "evict-oldest");
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Open one connection per symbol and start buffering ticks.
   * Returns without waiting for connections to open.
   */
  start(symbols: readonly string[]): Result<void, CollectorError> {
    if (this.running) {
      return err(new CollectorError("ALREADY_RUNNING", `Collector already running for ${this.symbols.join(", ")}`));
    }

    const canonical = canonicalSymbols(symbols);
    if (canonical.length === 0) {
      return err(new CollectorError("NO_SYMBOLS", "At least one symbol is required"));
    }

    this.running = true;
    this.symbols = canonical;
    this.lastSummaryAt = this.now();
    this.receivedAtLastSummary = this.received;

    console.log("═".repeat(50));
    console.log(`📡 Starting collector (${this.adapter.name})`);
    console.log(`   Symbols: ${canonical.join(", ")}`);
    console.log(`   Buffer: ${this.buffer.capacity.toLocaleString()} ticks (${this.buffer.overflowPolicy})`);
    console.log("═".repeat(50));

    for (const symbol of canonical) {
      if (!this.counters.has(symbol)) this.counters.set(symbol, { received: 0, malformed: 0 });
      try {
        const connection = this.connector({
          symbol,
          url: this.adapter.streamUrl(symbol),
          reconnect: this.reconnect,
          onMessage: (raw) => this.handleMessage(symbol, raw),
          onStateChange: (state) => {
            if (state === "failed") console.error(`❌ [${symbol}] Feed connection failed; other symbols continue`);
          },
        });
        this.connections.push(connection);
      } catch (error) {
        console.error(`❌ [${symbol}] Could not open connection: ${errorMessage(error)}`);
      }
    }

    return ok(undefined);
  }

  /**
   * Close every connection and stop accepting ticks. Buffered ticks stay
   * available to drain. Safe to call when already stopped.
   */
  stop(): void {
    if (!this.running) return;
    this.running = false;

    for (const connection of this.connections) {
      try {
        connection.close();
      } catch (error) {
        console.warn(`⚠️ [${connection.symbol}] Error while closing: ${errorMessage(error)}`);
      }
    }
    this.connections = [];
    console.log(`🛑 Collector stopped (${this.buffer.size.toLocaleString()} ticks pending)`);
  }

  /**
   * Copy buffered ticks in arrival order, optionally clearing the buffer
   */
  drain(clear = true): Tick[] {
    return this.buffer.drain(clear);
  }

  /**
   * Return drained ticks to the front of the buffer (e.g. after a failed write)
   */
  requeue(ticks: readonly Tick[]): void {
    if (ticks.length > 0) this.buffer.restore(ticks);
  }

  pendingCount(): number {
    return this.buffer.size;
  }

  /**
   * Register a per-tick consumer
   *
   * @returns Unsubscribe function
   */
  onTick(consumer: TickConsumer): () => void {
    this.consumers.add(consumer);
    return () => {
      this.consumers.delete(consumer);
    };
  }

  status(): CollectorStatus {
    const bySymbol = new Map(this.connections.map((c) => [c.symbol, c]));
    return {
      running: this.running,
      feed: this.adapter.name,
      symbols: [...this.symbols],
      connections: this.symbols.map((symbol) => {
        const connection = bySymbol.get(symbol);
        const counters = this.counters.get(symbol) ?? { received: 0, malformed: 0 };
        return {
          symbol,
          state: connection?.state ?? "closed",
          reconnectAttempts: connection?.reconnectAttempts ?? 0,
          received: counters.received,
          malformed: counters.malformed,
        };
      }),
      pending: this.buffer.size,
      capacity: this.buffer.capacity,
      overflowPolicy: this.buffer.overflowPolicy,
      received: this.received,
      malformed: this.malformed,
      dropped: this.buffer.dropped,
    };
  }

  private handleMessage(symbol: string, raw: string): void {
    // Messages racing with stop() are dropped
    if (!this.running) return;

    const counters = this.counters.get(symbol);
    const result = this.adapter.normalize(raw, symbol, this.now());

    if (!result.ok) {
      this.malformed++;
      if (counters) counters.malformed++;
      if (this.malformed <= MALFORMED_LOG_FIRST || this.malformed % MALFORMED_LOG_EVERY === 0) {
        console.warn(`⚠️ [${symbol}] Malformed message #${this.malformed}: ${result.error.message}`);
        console.warn(`   Raw (first 200 chars): ${raw.substring(0, 200)}`);
      }
      return;
    }

    const tick = result.value;
    this.buffer.push(tick);
    this.received++;
    if (counters) counters.received++;

    if (this.received <= INITIAL_TICKS_LOGGED) {
      console.log(`📥 Tick #${this.received}: ${tick.symbol} @ ${tick.price} x${tick.size}`);
    }

    const now = this.now();
    if (now - this.lastSummaryAt > SUMMARY_INTERVAL_MS) {
      const recent = this.received - this.receivedAtLastSummary;
      console.log(
        `📊 Collector: ${recent.toLocaleString()} ticks in last ${Math.round((now - this.lastSummaryAt) / 1000)}s | ` +
          `${this.buffer.size.toLocaleString()} pending | ${this.buffer.dropped.toLocaleString()} dropped | ` +
          `${this.malformed.toLocaleString()} malformed`
      );
      this.lastSummaryAt = now;
      this.receivedAtLastSummary = this.received;
    }

    this.dispatch(tick);
  }

  private dispatch(tick: Tick): void {
    for (const consumer of this.consumers) {
      try {
        const result = consumer(tick);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            console.error(`❌ Tick consumer failed for ${tick.symbol}: ${errorMessage(error)}`);
          });
        }
      } catch (error) {
        console.error(`❌ Tick consumer failed for ${tick.symbol}: ${errorMessage(error)}`);
      }
    }
  }
}
