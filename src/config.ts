import { z } from "zod";
import { TIMEFRAME_IDS } from "./lib/trade/timestamp.js";
import { BINANCE_FUTURES_WS_URL } from "./stream/normalizer.js";
import { err, ok, type Result } from "./lib/errors.js";

const integer = (fallback: number, min: number) => z.coerce.number().int().min(min).default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  PORT: integer(8080, 1),
  POSTGRES_URL: z.string().url().optional(),
  FEED_WS_URL: z.string().url().default(BINANCE_FUTURES_WS_URL),
  SYMBOLS: z
    .string()
    .default("btcusdt,ethusdt")
    .transform((value) =>
      value
        .split(",")
        .map((s) => s.trim().toLowerCase())
        .filter((s) => s.length > 0)
    ),
  DEFAULT_TIMEFRAME: z.enum(TIMEFRAME_IDS).default("1min"),
  ANALYTICS_WINDOW: integer(60, 2),
  REFRESH_INTERVAL_MS: integer(5000, 100),
  BUFFER_CAPACITY: integer(100_000, 1),
  BUFFER_OVERFLOW: z.enum(["evict-oldest", "reject-newest"]).default("evict-oldest"),
  GAP_FILL: z.enum(["carry", "none"]).default("carry"),
  RECONNECT_INITIAL_DELAY_MS: integer(1000, 1),
  RECONNECT_MAX_DELAY_MS: integer(30000, 1),
  RECONNECT_MAX_ATTEMPTS: integer(0, 0),
  TICK_QUERY_LIMIT: integer(10_000, 1),
  AUTO_START: flag(true),
});

export type AppConfig = z.output<typeof EnvSchema>;

/**
 * Parse configuration from environment variables.
 * Empty values count as unset so `.env` placeholders fall back to defaults.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Result<AppConfig, z.ZodError> {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) return err(parsed.error);

  if (parsed.data.RECONNECT_MAX_DELAY_MS < parsed.data.RECONNECT_INITIAL_DELAY_MS) {
    return err(
      new z.ZodError([
        {
          code: "custom",
          path: ["RECONNECT_MAX_DELAY_MS"],
          message: "Must be at least RECONNECT_INITIAL_DELAY_MS",
        },
      ])
    );
  }
  return ok(parsed.data);
}

export function reportConfigError(error: z.ZodError): void {
  console.error("═".repeat(50));
  console.error("❌ Invalid configuration");
  for (const issue of error.issues) {
    console.error(`   ${issue.path.join(".") || "(root)"}: ${issue.message}`);
  }
  console.error("═".repeat(50));
}
