import pg from "pg";
import type { Pool } from "pg";

export function createPostgresPool(connectionString: string): Pool {
  return new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
  });
}
