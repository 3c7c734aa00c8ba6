import type { Request, Response } from "express";
import { z } from "zod";
import type { Pipeline } from "../../pipeline.js";
import { epochMsParam, parseOrReject, sendServerError, symbolParam } from "../validation.js";

const DEFAULT_LIMIT = 1000;
const MAX_LIMIT = 100_000;

const TicksParams = z.object({ symbol: symbolParam });

const TicksQuery = z
  .object({
    start: epochMsParam.optional(),
    end: epochMsParam.optional(),
    limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT),
  })
  .refine((q) => q.start === undefined || q.end === undefined || q.start <= q.end, {
    message: "start must not be after end",
    path: ["start"],
  });

/**
 * Stored Ticks
 *
 * Query params:
 *   start - Start timestamp in ms, inclusive (optional)
 *   end   - End timestamp in ms, inclusive (optional)
 *   limit - Most recent N ticks in the range (default: 1000)
 *
 * Returns ticks oldest first.
 */
export function ticksHandler(pipeline: Pipeline) {
  return async (req: Request, res: Response): Promise<void> => {
    const params = parseOrReject(TicksParams, req.params, res);
    if (!params) return;
    const query = parseOrReject(TicksQuery, req.query, res);
    if (!query) return;

    try {
      const ticks = await pipeline.store.queryTicks(params.symbol, { start: query.start, end: query.end }, query.limit);
      res.json({ success: true, symbol: params.symbol, count: ticks.length, ticks });
    } catch (error) {
      sendServerError(res, "Failed to fetch ticks", error);
    }
  };
}
