import { Pool } from "pg";

/**
 * Hide the password in a connection string for logging
 */
export function redactConnectionString(url: string): string {
  return url.replace(/:[^:@/]+@/, ":***@");
}

export function createPool(connectionString: string): Pool {
  console.log(`Database URL: ${redactConnectionString(connectionString)}`);
  return new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });
}
