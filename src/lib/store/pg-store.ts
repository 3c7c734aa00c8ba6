/**
 * Postgres Tick Store
 *
 * Ticks are bulk-loaded with COPY FROM STDIN; bars are upserted in
 * parameterised batches keyed on (symbol, timeframe, bucket_start), so
 * re-resampling the same ticks rewrites the same rows.
 */

import { readFile } from "node:fs/promises";
import { Readable } from "node:stream";
import type { Pool, PoolClient, QueryResultRow } from "pg";
import { from as copyFrom } from "pg-copy-streams";
import type { OHLCBar, Tick, TimeframeId, TimeRange } from "../trade/types.js";
import { isTimeframeId } from "../trade/timestamp.js";
import { StorageError, errorMessage } from "../errors.js";
import type { TickStore } from "./types.js";

const SCHEMA_URL = new URL("../../../sql/schema.sql", import.meta.url);

/** Columns in the ohlc upsert */
export const OHLC_COLUMNS_PER_ROW = 9;

/** Bars per upsert statement */
const OHLC_BATCH_SIZE = 500;

// NULL representation in COPY text format
const COPY_NULL = "\\N";

const TICK_COLUMNS = "id, symbol, time, price, size, trade_id, event_time, is_buyer_maker";

type TickRow = {
  id: string;
  symbol: string;
  time: Date;
  price: number;
  size: number;
  trade_id: string | null;
  event_time: Date | null;
  is_buyer_maker: boolean | null;
};

type OhlcRow = {
  symbol: string;
  timeframe: string;
  bucket_start: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  trade_count: number;
};

/**
 * Build placeholder string for parameterized query
 * @param offset - Number of parameters before this row
 * @param count - Number of columns
 */
export function buildPlaceholder(offset: number, count: number): string {
  const parts: string[] = [];
  for (let i = 1; i <= count; i++) {
    parts.push(`$${offset + i}`);
  }
  return `(${parts.join(", ")})`;
}

/**
 * One tick as a COPY text-format line (tab separated, no trailing newline)
 */
export function formatTickForCopy(tick: Tick): string {
  const values = [
    tick.symbol,
    new Date(tick.timestamp).toISOString(),
    String(tick.price),
    String(tick.size),
    tick.tradeId !== undefined ? String(tick.tradeId) : COPY_NULL,
    tick.eventTime !== undefined ? new Date(tick.eventTime).toISOString() : COPY_NULL,
    tick.isBuyerMaker !== undefined ? String(tick.isBuyerMaker) : COPY_NULL,
  ];
  return values.join("\t");
}

/**
 * Build the upsert statement and parameters for a batch of bars
 */
export function buildOhlcUpsert(bars: readonly OHLCBar[]): { text: string; values: (string | number)[] } {
  const values: (string | number)[] = [];
  const placeholders: string[] = [];

  bars.forEach((bar, i) => {
    placeholders.push(buildPlaceholder(i * OHLC_COLUMNS_PER_ROW, OHLC_COLUMNS_PER_ROW));
    values.push(
      bar.symbol,
      bar.timeframe,
      new Date(bar.bucketStart).toISOString(),
      bar.open,
      bar.high,
      bar.low,
      bar.close,
      bar.volume,
      bar.tradeCount
    );
  });

  const text = `
    INSERT INTO ohlc (symbol, timeframe, bucket_start, open, high, low, close, volume, trade_count)
    VALUES ${placeholders.join(", ")}
    ON CONFLICT (symbol, timeframe, bucket_start) DO UPDATE SET
      open = EXCLUDED.open,
      high = EXCLUDED.high,
      low = EXCLUDED.low,
      close = EXCLUDED.close,
      volume = EXCLUDED.volume,
      trade_count = EXCLUDED.trade_count
  `;
  return { text, values };
}

/**
 * Append time-range conditions on `column`
 *
 * @returns SQL fragment (empty or starting with " AND") with params appended to `values`
 */
export function buildRangeClause(column: string, range: TimeRange | undefined, values: unknown[]): string {
  let clause = "";
  if (range?.start !== undefined) {
    values.push(new Date(range.start).toISOString());
    clause += ` AND ${column} >= $${values.length}`;
  }
  if (range?.end !== undefined) {
    values.push(new Date(range.end).toISOString());
    clause += ` AND ${column} <= $${values.length}`;
  }
  return clause;
}

function rowToTick(row: TickRow): Tick {
  return {
    symbol: row.symbol,
    timestamp: row.time.getTime(),
    price: row.price,
    size: row.size,
    ...(row.trade_id !== null ? { tradeId: Number(row.trade_id) } : {}),
    ...(row.event_time !== null ? { eventTime: row.event_time.getTime() } : {}),
    ...(row.is_buyer_maker !== null ? { isBuyerMaker: row.is_buyer_maker } : {}),
  };
}

function rowToBar(row: OhlcRow, timeframe: TimeframeId): OHLCBar {
  return {
    symbol: row.symbol,
    timeframe: isTimeframeId(row.timeframe) ? row.timeframe : timeframe,
    bucketStart: row.bucket_start.getTime(),
    open: row.open,
    high: row.high,
    low: row.low,
    close: row.close,
    volume: row.volume,
    tradeCount: row.trade_count,
  };
}

async function copyTicks(client: PoolClient, ticks: readonly Tick[]): Promise<number> {
  if (ticks.length === 0) return 0;

  return new Promise((resolve, reject) => {
    const copyQuery = `
      COPY ticks (symbol, time, price, size, trade_id, event_time, is_buyer_maker)
      FROM STDIN WITH (FORMAT text, NULL '\\N')
    `;

    const stream = client.query(copyFrom(copyQuery));

    const data = ticks.map(formatTickForCopy).join("\n") + "\n";
    const readable = Readable.from([data]);

    stream.on("finish", () => resolve(ticks.length));
    stream.on("error", reject);
    readable.on("error", reject);

    readable.pipe(stream);
  });
}

/**
 * Create tables and indexes if they do not exist
 */
export async function ensureSchema(pool: Pool): Promise<void> {
  const ddl = await readFile(SCHEMA_URL, "utf8");
  await pool.query(ddl);
}

export class PgTickStore implements TickStore {
  constructor(private readonly pool: Pool) {}

  async insertTick(tick: Tick): Promise<void> {
    await this.insertTicks([tick]);
  }

  async insertTicks(ticks: readonly Tick[]): Promise<number> {
    if (ticks.length === 0) return 0;
    const client = await this.connect();
    try {
      return await copyTicks(client, ticks);
    } catch (error) {
      throw new StorageError(`Failed to write ${ticks.length} ticks: ${errorMessage(error)}`, { cause: error });
    } finally {
      client.release();
    }
  }

  async insertOhlc(bars: readonly OHLCBar[]): Promise<number> {
    let written = 0;
    for (let i = 0; i < bars.length; i += OHLC_BATCH_SIZE) {
      const batch = bars.slice(i, i + OHLC_BATCH_SIZE);
      const { text, values } = buildOhlcUpsert(batch);
      try {
        const result = await this.pool.query(text, values);
        written += result.rowCount ?? batch.length;
      } catch (error) {
        throw new StorageError(`Failed to upsert ${batch.length} bars: ${errorMessage(error)}`, { cause: error });
      }
    }
    return written;
  }

  async queryTicks(symbol: string, range?: TimeRange, limit?: number): Promise<Tick[]> {
    const values: unknown[] = [symbol];
    const where = `WHERE symbol = $1${buildRangeClause("time", range, values)}`;

    let text: string;
    if (limit !== undefined) {
      values.push(limit);
      // Most recent N, returned oldest first
      text = `
        SELECT * FROM (
          SELECT ${TICK_COLUMNS} FROM ticks ${where}
          ORDER BY time DESC, id DESC
          LIMIT $${values.length}
        ) recent
        ORDER BY time, id
      `;
    } else {
      text = `SELECT ${TICK_COLUMNS} FROM ticks ${where} ORDER BY time, id`;
    }

    const rows = await this.run<TickRow>(text, values);
    return rows.map(rowToTick);
  }

  async queryOhlc(symbol: string, timeframe: TimeframeId, range?: TimeRange): Promise<OHLCBar[]> {
    const values: unknown[] = [symbol, timeframe];
    const text = `
      SELECT symbol, timeframe, bucket_start, open, high, low, close, volume, trade_count
      FROM ohlc
      WHERE symbol = $1 AND timeframe = $2${buildRangeClause("bucket_start", range, values)}
      ORDER BY bucket_start
    `;
    const rows = await this.run<OhlcRow>(text, values);
    return rows.map((row) => rowToBar(row, timeframe));
  }

  async listSymbols(): Promise<string[]> {
    const rows = await this.run<{ symbol: string }>("SELECT DISTINCT symbol FROM ticks ORDER BY symbol", []);
    return rows.map((row) => row.symbol);
  }

  async countTicks(symbol?: string): Promise<number> {
    const rows =
      symbol === undefined
        ? await this.run<{ n: string }>("SELECT COUNT(*)::bigint AS n FROM ticks", [])
        : await this.run<{ n: string }>("SELECT COUNT(*)::bigint AS n FROM ticks WHERE symbol = $1", [symbol]);
    return Number(rows[0]?.n ?? 0);
  }

  async ping(): Promise<void> {
    await this.run("SELECT 1", []);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async connect(): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      throw new StorageError(`Database connection failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async run<R extends QueryResultRow>(text: string, values: unknown[]): Promise<R[]> {
    try {
      const result = await this.pool.query<R>(text, values);
      return result.rows;
    } catch (error) {
      throw new StorageError(`Query failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
