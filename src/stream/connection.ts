/**
 * WebSocket Feed Connection
 *
 * One connection per symbol. Unexpected closes are retried with exponential
 * backoff; a heartbeat ping detects dead sockets. Failures stay inside the
 * connection and never reach other symbols.
 */

import WebSocket from "ws";
import { ConnectionFailureError } from "../lib/errors.js";
import type { ConnectOptions, ConnectionState, Connector, FeedConnection, ReconnectPolicy } from "./types.js";

const PING_INTERVAL_MS = 30000;

/**
 * Delay before reconnect attempt number `attempt` (0-based)
 */
export function reconnectDelay(policy: ReconnectPolicy, attempt: number): number {
  return Math.min(policy.initialDelayMs * Math.pow(2, attempt), policy.maxDelayMs);
}

function rawToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export class WsFeedConnection implements FeedConnection {
  readonly symbol: string;
  private socket: WebSocket | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private attempts = 0;
  private current: ConnectionState = "connecting";
  private closedByUser = false;

  constructor(private readonly options: ConnectOptions) {
    this.symbol = options.symbol;
    this.connect();
  }

  get state(): ConnectionState {
    return this.current;
  }

  get reconnectAttempts(): number {
    return this.attempts;
  }

  close(): void {
    if (this.closedByUser) return;
    this.closedByUser = true;
    this.clearTimers();

    const socket = this.socket;
    this.socket = null;
    if (socket) {
      socket.removeAllListeners();
      // Keep an error listener so a close during the handshake does not throw
      socket.on("error", () => undefined);
      socket.terminate();
    }
    this.setState("closed");
  }

  private setState(state: ConnectionState): void {
    if (this.current === state) return;
    this.current = state;
    this.options.onStateChange?.(state);
  }

  private clearTimers(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private connect(): void {
    const { symbol, url } = this.options;
    console.log(`🔌 [${symbol}] Connecting to ${url}...`);

    const socket = new WebSocket(url);
    this.socket = socket;

    socket.on("open", () => {
      console.log(`✅ [${symbol}] Connected`);
      this.attempts = 0;
      this.setState("open");

      this.pingTimer = setInterval(() => {
        if (socket.readyState === WebSocket.OPEN) socket.ping();
      }, PING_INTERVAL_MS);
    });

    socket.on("message", (data: WebSocket.RawData) => {
      this.options.onMessage(rawToString(data));
    });

    socket.on("error", (error: Error) => {
      const failure = new ConnectionFailureError(symbol, error.message, { cause: error });
      console.error(`❌ [${symbol}] ${failure.code}: ${failure.message}`);
    });

    socket.on("close", (code: number) => {
      if (this.pingTimer) {
        clearInterval(this.pingTimer);
        this.pingTimer = null;
      }
      if (this.closedByUser || this.socket !== socket) return;
      this.socket = null;
      console.log(`🔌 [${symbol}] Connection closed (code ${code})`);
      this.scheduleReconnect();
    });
  }

  private scheduleReconnect(): void {
    const { symbol, reconnect } = this.options;

    if (reconnect.maxAttempts > 0 && this.attempts >= reconnect.maxAttempts) {
      console.error(`❌ [${symbol}] Giving up after ${this.attempts} reconnect attempts`);
      this.setState("failed");
      return;
    }

    const delay = reconnectDelay(reconnect, this.attempts);
    this.attempts++;
    this.setState("reconnecting");

    console.log(`🔄 [${symbol}] Reconnecting in ${delay}ms (attempt ${this.attempts})...`);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.closedByUser) this.connect();
    }, delay);
  }
}

export const wsConnector: Connector = (options) => new WsFeedConnection(options);
