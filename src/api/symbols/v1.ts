import type { Request, Response } from "express";
import type { Pipeline } from "../../pipeline.js";
import { sendServerError } from "../validation.js";

/**
 * Symbols currently collected and symbols with stored ticks
 */
export function symbolsHandler(pipeline: Pipeline) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const stored = await pipeline.store.listSymbols();
      res.json({ success: true, collecting: pipeline.collector.status().symbols, stored });
    } catch (error) {
      sendServerError(res, "Failed to list symbols", error);
    }
  };
}
