/**
 * Postgres pool for the schedule database (DATABASE_URL).
 *
 * The legs store sends its raw SQL through `query`; Kysely (src/config/db.ts)
 * runs the ingestion-status reads on the same pool.
 */

import "dotenv/config";
import pg from "pg";
import type { Pool, QueryResultRow } from "pg";

// Search reads fan out per airport, so the pool is sized for bursts of short reads.
const pool = new pg.Pool({
  connectionString: process.env.DATABASE_URL,
  max: 20,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
});

/** Handed to Kysely's PostgresDialect; ending it is Kysely's job on app close. */
export function getPool(): Pool {
  return pool;
}

/** One parameterized statement; rows only. */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  values?: unknown[]
): Promise<T[]> {
  const { rows } = await pool.query<T>(text, values);
  return rows;
}
