import "dotenv/config";
import { parseConfig, reportConfigError } from "./config.js";
import { createApp } from "./app.js";
import { Pipeline } from "./pipeline.js";
import { Collector, binanceFuturesAdapter } from "./stream/index.js";
import { createPool } from "./lib/db.js";
import { MemoryTickStore, PgTickStore, ensureSchema, type TickStore } from "./lib/store/index.js";
import { errorMessage } from "./lib/errors.js";

async function createStore(postgresUrl: string | undefined): Promise<TickStore> {
  if (!postgresUrl) {
    console.warn("⚠️ POSTGRES_URL not set, ticks and bars are kept in memory only");
    return new MemoryTickStore();
  }
  const pool = createPool(postgresUrl);
  await ensureSchema(pool);
  return new PgTickStore(pool);
}

async function main(): Promise<void> {
  const parsed = parseConfig(process.env);
  if (!parsed.ok) {
    reportConfigError(parsed.error);
    process.exit(1);
  }
  const config = parsed.value;

  const store = await createStore(config.POSTGRES_URL);
  const collector = new Collector({
    adapter: binanceFuturesAdapter(config.FEED_WS_URL),
    bufferCapacity: config.BUFFER_CAPACITY,
    overflowPolicy: config.BUFFER_OVERFLOW,
    reconnect: {
      initialDelayMs: config.RECONNECT_INITIAL_DELAY_MS,
      maxDelayMs: config.RECONNECT_MAX_DELAY_MS,
      maxAttempts: config.RECONNECT_MAX_ATTEMPTS,
    },
  });
  const pipeline = new Pipeline({
    collector,
    store,
    timeframe: config.DEFAULT_TIMEFRAME,
    window: config.ANALYTICS_WINDOW,
    gapFill: config.GAP_FILL,
    tickQueryLimit: config.TICK_QUERY_LIMIT,
    refreshIntervalMs: config.REFRESH_INTERVAL_MS,
  });

  if (config.AUTO_START) {
    const started = pipeline.start(config.SYMBOLS);
    if (!started.ok) console.error(`❌ Could not start collector: ${started.error.message}`);
  }

  const server = createApp(pipeline).listen(config.PORT, "::", () => {
    console.log(`🚀 Tick analytics API running on port ${config.PORT}`);
    console.log(`   Health: http://localhost:${config.PORT}/health`);
    console.log(`   Stats: http://localhost:${config.PORT}/stats`);
    console.log(`   Analytics: http://localhost:${config.PORT}/analytics/<symbol>?timeframe=${config.DEFAULT_TIMEFRAME}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`${signal} received, shutting down gracefully...`);

    server.close();
    try {
      const flushed = await pipeline.stop();
      console.log(`🔄 Final flush wrote ${flushed} tick(s)`);
    } catch (error) {
      console.error(`❌ Final flush failed: ${errorMessage(error)}`);
    }
    await store.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error(`❌ Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error(`❌ Startup failed: ${errorMessage(error)}`);
  process.exit(1);
});
