import type { Request, Response } from "express";
import { z } from "zod";
import type { Pipeline } from "../../pipeline.js";
import { closeSeries, volumeSeries } from "../../lib/analytics/series.js";
import { bollingerBands } from "../../lib/analytics/bands.js";
import { volumeProfile } from "../../lib/analytics/volume-profile.js";
import { toAlertContext, toPairAlertContext } from "../../lib/analytics/snapshot.js";
import { parseOrReject, sendServerError, symbolParam, timeframeParam, windowParam } from "../validation.js";

const SymbolParams = z.object({ symbol: symbolParam });

/**
 * Symbol Analytics
 *
 * Query params:
 *   timeframe - Bar timeframe (default: pipeline timeframe)
 *   window    - Rolling window in bars (default: pipeline window)
 *
 * Recomputes bars from stored ticks, then returns price statistics, z-score,
 * ADF, returns, volatility, 20-bar Bollinger bands and the volume profile.
 */
export function symbolAnalyticsHandler(pipeline: Pipeline) {
  const Query = z.object({
    timeframe: timeframeParam.default(pipeline.timeframe),
    window: windowParam.default(pipeline.window),
  });

  return async (req: Request, res: Response): Promise<void> => {
    const params = parseOrReject(SymbolParams, req.params, res);
    if (!params) return;
    const query = parseOrReject(Query, req.query, res);
    if (!query) return;

    try {
      const { bars, snapshot } = await pipeline.analyzeSymbol(params.symbol, query.timeframe, query.window);
      if (bars.length === 0) {
        res.status(404).json({ success: false, error: `No ticks stored for ${params.symbol}` });
        return;
      }

      const closes = closeSeries(bars);
      res.json({
        success: true,
        ...snapshot,
        bands: bollingerBands(closes),
        volumeProfile: volumeProfile(closes, volumeSeries(bars)),
        variables: toAlertContext(snapshot),
      });
    } catch (error) {
      sendServerError(res, "Failed to compute analytics", error);
    }
  };
}

/**
 * Pair Analytics
 *
 * Query params:
 *   a, b      - Symbols (required, distinct)
 *   timeframe - Bar timeframe (default: pipeline timeframe)
 *   window    - Rolling window in bars (default: pipeline window)
 *
 * Returns hedge ratio, rolling correlation, spread, spread z-score and spread ADF.
 */
export function pairAnalyticsHandler(pipeline: Pipeline) {
  const Query = z
    .object({
      a: symbolParam,
      b: symbolParam,
      timeframe: timeframeParam.default(pipeline.timeframe),
      window: windowParam.default(pipeline.window),
    })
    .refine((q) => q.a !== q.b, { message: "a and b must be different symbols", path: ["b"] });

  return async (req: Request, res: Response): Promise<void> => {
    const query = parseOrReject(Query, req.query, res);
    if (!query) return;

    try {
      const pair = await pipeline.pairSnapshot(query.a, query.b, query.timeframe, query.window);
      res.json({ success: true, ...pair, variables: toPairAlertContext(pair) });
    } catch (error) {
      sendServerError(res, "Failed to compute pair analytics", error);
    }
  };
}
