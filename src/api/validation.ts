import type { Response } from "express";
import { z } from "zod";
import { TIMEFRAME_IDS } from "../lib/trade/timestamp.js";

export const symbolParam = z
  .string()
  .trim()
  .min(1)
  .regex(/^[A-Za-z0-9_-]+$/, "Symbol may only contain letters, digits, '_' and '-'")
  .transform((value) => value.toLowerCase());

export const timeframeParam = z.enum(TIMEFRAME_IDS);

/** Epoch milliseconds from a query string */
export const epochMsParam = z.coerce.number().int().nonnegative();

export const windowParam = z.coerce.number().int().min(2).max(10_000);

export const booleanParam = z.enum(["true", "false"]).transform((value) => value === "true");

/**
 * Validate a request part; on failure send a 400 and return null
 */
export function parseOrReject<S extends z.ZodTypeAny>(schema: S, value: unknown, res: Response): z.output<S> | null {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  res.status(400).json({
    success: false,
    error: "Invalid request",
    issues: result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  });
  return null;
}

/**
 * Send the standard 500 response and log the failure
 */
export function sendServerError(res: Response, context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`❌ ${context}:`, message);
  res.status(500).json({
    success: false,
    error: context,
    message,
  });
}
