import type { Request, Response } from "express";
import type { Pipeline } from "../../pipeline.js";

/**
 * Health Check
 */
export function healthHandler(pipeline: Pipeline) {
  return async (_req: Request, res: Response): Promise<void> => {
    const collector = pipeline.collector.status();
    try {
      await pipeline.store.ping();

      res.status(200).json({
        status: "healthy",
        timestamp: new Date().toISOString(),
        database: "connected",
        collector: {
          running: collector.running,
          symbols: collector.symbols,
          connections: collector.connections.map(({ symbol, state }) => ({ symbol, state })),
          pending: collector.pending,
        },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("Health check failed:", message);
      res.status(503).json({
        status: "unhealthy",
        timestamp: new Date().toISOString(),
        database: "disconnected",
        error: message,
      });
    }
  };
}
