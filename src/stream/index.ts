export type {
  FeedAdapter,
  ConnectionState,
  ReconnectPolicy,
  ConnectOptions,
  FeedConnection,
  Connector,
  OverflowPolicy,
  TickConsumer,
  ConnectionStatus,
  CollectorStatus,
} from "./types.js";
export { DEFAULT_RECONNECT_POLICY } from "./types.js";
export { BINANCE_FUTURES_WS_URL, BinanceTradeSchema, normalizeBinanceTrade, binanceFuturesAdapter } from "./normalizer.js";
export { TickBuffer, DEFAULT_BUFFER_CAPACITY } from "./tick-buffer.js";
export { WsFeedConnection, wsConnector, reconnectDelay } from "./connection.js";
export { Collector, canonicalSymbols, type CollectorOptions } from "./collector.js";
