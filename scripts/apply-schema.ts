#!/usr/bin/env npx tsx
/**
 * Create the ticks and ohlc tables
 *
 * Usage:
 *   POSTGRES_URL=postgresql://... npx tsx scripts/apply-schema.ts
 */

import "dotenv/config";
import { createPool } from "../src/lib/db.js";
import { ensureSchema } from "../src/lib/store/pg-store.js";
import { errorMessage } from "../src/lib/errors.js";

const POSTGRES_URL = process.env.POSTGRES_URL;

if (!POSTGRES_URL) {
  console.error("Missing POSTGRES_URL");
  process.exit(1);
}

const pool = createPool(POSTGRES_URL);

try {
  await ensureSchema(pool);
  console.log("✅ Schema applied");
} catch (error) {
  console.error(`❌ Failed to apply schema: ${errorMessage(error)}`);
  process.exitCode = 1;
} finally {
  await pool.end();
}
