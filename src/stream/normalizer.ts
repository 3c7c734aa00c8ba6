/**
 * Feed Normalizer
 *
 * Maps raw feed messages to canonical ticks. Each feed gets a FeedAdapter;
 * the shipped one reads Binance USDⓈ-M futures `<symbol>@trade` streams.
 *
 * Binance trade message:
 * {
 *   "e": "trade",          // Event type
 *   "E": 1700000000123,    // Event time (ms)
 *   "s": "BTCUSDT",        // Symbol
 *   "t": 12345,            // Trade id
 *   "p": "40000.00",       // Price (decimal string)
 *   "q": "0.100",          // Quantity (decimal string)
 *   "T": 1700000000120,    // Trade time (ms)
 *   "m": true              // Buyer is the maker
 * }
 *
 * Timestamp precedence: trade time, then event time, then local receive time.
 */

import { z } from "zod";
import type { Tick } from "../lib/trade/types.js";
import { MalformedMessageError, err, ok, type Result } from "../lib/errors.js";
import type { FeedAdapter } from "./types.js";

export const BINANCE_FUTURES_WS_URL = "wss://fstream.binance.com/ws";

// Decimal strings or numbers, parsed to a finite number
const decimal = z.union([z.string().trim().min(1), z.number()]).pipe(z.coerce.number().finite());

const epochMs = z.number().finite().nonnegative();

export const BinanceTradeSchema = z.object({
  e: z.literal("trade"),
  E: epochMs.optional(),
  s: z.string().optional(),
  t: z.number().int().optional(),
  p: decimal,
  q: decimal.pipe(z.number().nonnegative()),
  T: epochMs.optional(),
  m: z.boolean().optional(),
});

export type BinanceTrade = z.infer<typeof BinanceTradeSchema>;

function parseJson(raw: string): Result<unknown, MalformedMessageError> {
  try {
    return ok(JSON.parse(raw));
  } catch (error) {
    return err(new MalformedMessageError("Message is not valid JSON", { cause: error }));
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * Normalize one Binance trade message
 */
export function normalizeBinanceTrade(raw: string, symbol: string, receivedAt: number): Result<Tick, MalformedMessageError> {
  const json = parseJson(raw);
  if (!json.ok) return json;

  const parsed = BinanceTradeSchema.safeParse(json.value);
  if (!parsed.success) {
    return err(new MalformedMessageError(`Invalid trade message: ${describeIssues(parsed.error)}`, { cause: parsed.error }));
  }

  const trade = parsed.data;
  const tick: Tick = {
    symbol: (trade.s ?? symbol).trim().toLowerCase() || symbol.toLowerCase(),
    timestamp: trade.T ?? trade.E ?? receivedAt,
    price: trade.p,
    size: trade.q,
    ...(trade.t !== undefined ? { tradeId: trade.t } : {}),
    ...(trade.E !== undefined ? { eventTime: trade.E } : {}),
    ...(trade.m !== undefined ? { isBuyerMaker: trade.m } : {}),
  };
  return ok(tick);
}

/**
 * Binance USDⓈ-M futures trade stream, one connection per symbol
 */
export function binanceFuturesAdapter(baseUrl: string = BINANCE_FUTURES_WS_URL): FeedAdapter {
  const base = baseUrl.replace(/\/+$/, "");
  return {
    name: "binance-futures",
    streamUrl: (symbol) => `${base}/${symbol.toLowerCase()}@trade`,
    normalize: normalizeBinanceTrade,
  };
}
