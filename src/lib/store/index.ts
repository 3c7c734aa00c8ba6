export type { TickStore } from "./types.js";
export {
  PgTickStore,
  ensureSchema,
  buildPlaceholder,
  buildOhlcUpsert,
  buildRangeClause,
  formatTickForCopy,
  OHLC_COLUMNS_PER_ROW,
} from "./pg-store.js";
export { MemoryTickStore } from "./memory-store.js";
