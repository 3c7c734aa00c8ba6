import type { Request, Response } from "express";
import { z } from "zod";
import type { Pipeline } from "../../pipeline.js";
import { booleanParam, parseOrReject, sendServerError, symbolParam } from "../validation.js";

const StartBody = z.object({
  symbols: z.array(symbolParam).min(1).max(50),
});

const BufferQuery = z.object({
  clear: booleanParam.default("false"),
});

/**
 * Collector - Start
 * Body: { symbols: string[] }
 */
export function startCollectorHandler(pipeline: Pipeline) {
  return async (req: Request, res: Response): Promise<void> => {
    const body = parseOrReject(StartBody, req.body, res);
    if (!body) return;

    try {
      const started = pipeline.start(body.symbols);
      if (!started.ok) {
        res.status(started.error.code === "ALREADY_RUNNING" ? 409 : 400).json({
          success: false,
          error: started.error.code,
          message: started.error.message,
        });
        return;
      }
      res.json({ success: true, collector: pipeline.collector.status() });
    } catch (error) {
      sendServerError(res, "Failed to start collector", error);
    }
  };
}

/**
 * Collector - Stop
 * Stops every connection and writes the remaining buffered ticks.
 */
export function stopCollectorHandler(pipeline: Pipeline) {
  return async (_req: Request, res: Response): Promise<void> => {
    if (!pipeline.isRunning) {
      res.status(409).json({ success: false, error: "NOT_RUNNING", message: "Collector is not running" });
      return;
    }

    try {
      const flushed = await pipeline.stop();
      res.json({ success: true, flushed, collector: pipeline.collector.status() });
    } catch (error) {
      sendServerError(res, "Failed to stop collector", error);
    }
  };
}

/**
 * Collector - Buffer
 *
 * Query params:
 *   clear - "true" removes the returned ticks from the buffer, so they are
 *           never written to the store (default: false)
 */
export function bufferHandler(pipeline: Pipeline) {
  return async (req: Request, res: Response): Promise<void> => {
    const query = parseOrReject(BufferQuery, req.query, res);
    if (!query) return;

    try {
      const ticks = pipeline.collector.drain(query.clear);
      res.json({ success: true, count: ticks.length, cleared: query.clear, ticks });
    } catch (error) {
      sendServerError(res, "Failed to read buffer", error);
    }
  };
}
