import type { Request, Response } from "express";
import { z } from "zod";
import type { Pipeline } from "../../pipeline.js";
import { DEFAULT_HISTORY_QUERY } from "../../lib/alerts/alert-engine.js";
import { parseOrReject, sendServerError, symbolParam } from "../validation.js";

const AddBody = z.object({
  condition: z.string().trim().min(1).max(500),
  symbol: symbolParam.optional(),
});

const IdParams = z.object({ id: z.coerce.number().int().positive() });

const HistoryQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(DEFAULT_HISTORY_QUERY),
});

function notFound(res: Response, id: number): void {
  res.status(404).json({ success: false, error: `Alert #${id} not found` });
}

/**
 * Alerts - Add
 * Body: { condition: string, symbol?: string }
 */
export function addAlertHandler(pipeline: Pipeline) {
  return async (req: Request, res: Response): Promise<void> => {
    const body = parseOrReject(AddBody, req.body, res);
    if (!body) return;

    try {
      const added = pipeline.alerts.addRule(body.condition, { symbol: body.symbol });
      if (!added.ok) {
        res.status(400).json({
          success: false,
          error: added.error.code,
          message: added.error.message,
          position: added.error.position,
        });
        return;
      }
      res.status(201).json({ success: true, rule: added.value });
    } catch (error) {
      sendServerError(res, "Failed to add alert", error);
    }
  };
}

/**
 * Alerts - List
 */
export function listAlertsHandler(pipeline: Pipeline) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json({ success: true, rules: pipeline.alerts.listRules() });
    } catch (error) {
      sendServerError(res, "Failed to list alerts", error);
    }
  };
}

/**
 * Alerts - Reset one rule so it can fire again
 */
export function resetAlertHandler(pipeline: Pipeline) {
  return async (req: Request, res: Response): Promise<void> => {
    const params = parseOrReject(IdParams, req.params, res);
    if (!params) return;

    try {
      if (!pipeline.alerts.resetRule(params.id)) {
        notFound(res, params.id);
        return;
      }
      res.json({ success: true, rule: pipeline.alerts.getRule(params.id) });
    } catch (error) {
      sendServerError(res, "Failed to reset alert", error);
    }
  };
}

/**
 * Alerts - Reset every rule
 */
export function resetAllAlertsHandler(pipeline: Pipeline) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      pipeline.alerts.resetAll();
      res.json({ success: true, rules: pipeline.alerts.listRules() });
    } catch (error) {
      sendServerError(res, "Failed to reset alerts", error);
    }
  };
}

/**
 * Alerts - Delete
 */
export function deleteAlertHandler(pipeline: Pipeline) {
  return async (req: Request, res: Response): Promise<void> => {
    const params = parseOrReject(IdParams, req.params, res);
    if (!params) return;

    try {
      if (!pipeline.alerts.removeRule(params.id)) {
        notFound(res, params.id);
        return;
      }
      res.json({ success: true, id: params.id });
    } catch (error) {
      sendServerError(res, "Failed to delete alert", error);
    }
  };
}

/**
 * Alerts - History
 *
 * Query params:
 *   limit - Most recent N events, oldest first (default: 100)
 */
export function alertHistoryHandler(pipeline: Pipeline) {
  return async (req: Request, res: Response): Promise<void> => {
    const query = parseOrReject(HistoryQuery, req.query, res);
    if (!query) return;

    try {
      const events = pipeline.alerts.history(query.limit);
      res.json({ success: true, count: events.length, events });
    } catch (error) {
      sendServerError(res, "Failed to fetch alert history", error);
    }
  };
}
