/**
 * Type definitions for feed ingestion
 */

import type { Tick } from "../lib/trade/types.js";
import type { MalformedMessageError, Result } from "../lib/errors.js";

/**
 * Per-feed mapping from raw messages to ticks
 */
export interface FeedAdapter {
  /** Feed name for logs and status (e.g., "binance-futures") */
  readonly name: string;
  /** Stream URL carrying one symbol's trades */
  streamUrl(symbol: string): string;
  /**
   * Turn one raw message into a tick
   *
   * @param symbol - Symbol the connection subscribed to, used when the message has none
   * @param receivedAt - Local receive time (epoch ms), used when the message has no timestamp
   */
  normalize(raw: string, symbol: string, receivedAt: number): Result<Tick, MalformedMessageError>;
}

export type ConnectionState = "connecting" | "open" | "reconnecting" | "closed" | "failed";

/**
 * Reconnect policy for one connection.
 * delay = min(initialDelayMs * 2^attempt, maxDelayMs)
 */
export interface ReconnectPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  /** Give up after this many consecutive failed attempts; 0 retries forever */
  maxAttempts: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 0,
};

export interface ConnectOptions {
  symbol: string;
  url: string;
  reconnect: ReconnectPolicy;
  onMessage: (raw: string) => void;
  onStateChange?: (state: ConnectionState) => void;
}

/**
 * One live feed connection for a single symbol
 */
export interface FeedConnection {
  readonly symbol: string;
  readonly state: ConnectionState;
  readonly reconnectAttempts: number;
  /** Close for good; no reconnect follows. Safe to call more than once. */
  close(): void;
}

export type Connector = (options: ConnectOptions) => FeedConnection;

/**
 * What the buffer does with a tick that arrives while it is full
 * - evict-oldest: drop the oldest buffered tick to make room
 * - reject-newest: drop the arriving tick
 */
export type OverflowPolicy = "evict-oldest" | "reject-newest";

export type TickConsumer = (tick: Tick) => void | Promise<void>;

export interface ConnectionStatus {
  symbol: string;
  state: ConnectionState;
  reconnectAttempts: number;
  received: number;
  malformed: number;
}

export interface CollectorStatus {
  running: boolean;
  feed: string;
  symbols: string[];
  connections: ConnectionStatus[];
  pending: number;
  capacity: number;
  overflowPolicy: OverflowPolicy;
  received: number;
  malformed: number;
  dropped: number;
}
