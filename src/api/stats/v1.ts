import type { Request, Response } from "express";
import type { Pipeline } from "../../pipeline.js";
import { sendServerError } from "../validation.js";

/**
 * Pipeline counters: collector, store, cycles and alerts
 */
export function statsHandler(pipeline: Pipeline) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json({ success: true, timestamp: new Date().toISOString(), stats: await pipeline.stats() });
    } catch (error) {
      sendServerError(res, "Failed to fetch stats", error);
    }
  };
}
