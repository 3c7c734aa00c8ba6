import type { Request, Response } from "express";
import { z } from "zod";
import type { Pipeline } from "../../pipeline.js";
import { booleanParam, epochMsParam, parseOrReject, sendServerError, symbolParam, timeframeParam } from "../validation.js";

const OhlcParams = z.object({ symbol: symbolParam });

/**
 * Stored Bars
 *
 * Query params:
 *   timeframe - 1s | 1min | 5min | 15min | 1h | 1d (default: pipeline timeframe)
 *   start     - Start bucket in ms, inclusive (optional)
 *   end       - End bucket in ms, inclusive (optional)
 *   refresh   - "true" resamples stored ticks first (default: false)
 *
 * Returns array of tuples: [bucket_start_ms, open, high, low, close, volume]
 */
export function ohlcHandler(pipeline: Pipeline) {
  const OhlcQuery = z.object({
    timeframe: timeframeParam.default(pipeline.timeframe),
    start: epochMsParam.optional(),
    end: epochMsParam.optional(),
    refresh: booleanParam.default("false"),
  });

  return async (req: Request, res: Response): Promise<void> => {
    const params = parseOrReject(OhlcParams, req.params, res);
    if (!params) return;
    const query = parseOrReject(OhlcQuery, req.query, res);
    if (!query) return;

    try {
      if (query.refresh) await pipeline.resampleSymbol(params.symbol, query.timeframe);
      const bars = await pipeline.store.queryOhlc(params.symbol, query.timeframe, { start: query.start, end: query.end });

      res.set("X-Timeframe", query.timeframe);
      res.set("X-Count", bars.length.toString());
      res.json(bars.map((bar) => [bar.bucketStart, bar.open, bar.high, bar.low, bar.close, bar.volume]));
    } catch (error) {
      sendServerError(res, "Failed to fetch bars", error);
    }
  };
}
