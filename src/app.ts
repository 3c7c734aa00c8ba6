import express, { type Express } from "express";
import cors from "cors";
import type { Pipeline } from "./pipeline.js";
import { healthHandler } from "./api/health/v1.js";
import { bufferHandler, startCollectorHandler, stopCollectorHandler } from "./api/collector/v1.js";
import { ticksHandler } from "./api/ticks/v1.js";
import { ohlcHandler } from "./api/ohlc/v1.js";
import { symbolsHandler } from "./api/symbols/v1.js";
import { pairAnalyticsHandler, symbolAnalyticsHandler } from "./api/analytics/v1.js";
import {
  addAlertHandler,
  alertHistoryHandler,
  deleteAlertHandler,
  listAlertsHandler,
  resetAlertHandler,
  resetAllAlertsHandler,
} from "./api/alerts/v1.js";
import { statsHandler } from "./api/stats/v1.js";

/**
 * Build the HTTP API around a pipeline
 */
export function createApp(pipeline: Pipeline): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/health", healthHandler(pipeline));

  // Collector
  app.post("/collector/start", startCollectorHandler(pipeline));
  app.post("/collector/stop", stopCollectorHandler(pipeline));
  app.get("/collector/buffer", bufferHandler(pipeline));

  // Stored data
  app.get("/ticks/:symbol", ticksHandler(pipeline));
  app.get("/ohlc/:symbol", ohlcHandler(pipeline));
  app.get("/symbols", symbolsHandler(pipeline));

  // Analytics (pair before :symbol)
  app.get("/analytics/pair", pairAnalyticsHandler(pipeline));
  app.get("/analytics/:symbol", symbolAnalyticsHandler(pipeline));

  // Alerts
  app.post("/alerts", addAlertHandler(pipeline));
  app.get("/alerts", listAlertsHandler(pipeline));
  app.get("/alerts/history", alertHistoryHandler(pipeline));
  app.post("/alerts/reset", resetAllAlertsHandler(pipeline));
  app.post("/alerts/:id/reset", resetAlertHandler(pipeline));
  app.delete("/alerts/:id", deleteAlertHandler(pipeline));

  app.get("/stats", statsHandler(pipeline));

  return app;
}
