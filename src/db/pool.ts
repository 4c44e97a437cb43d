import { Pool } from 'pg';
import { env } from '../config/env.js';

const APPLICATION_NAME = 'windshield-repair-engine';

let pool: Pool | null = null;

/** Shared pool, or null when DATABASE_URL is unset and the in-memory data layer is used. */
export function getPool(): Pool | null {
  if (!env.DATABASE_URL) {
    return null;
  }

  if (!pool) {
    pool = new Pool({
      connectionString: env.DATABASE_URL,
      application_name: APPLICATION_NAME,
      // waiting for a connection counts against the same budget as waiting for a counter lock
      connectionTimeoutMillis: env.COUNTER_LOCK_TIMEOUT_MS
    });
  }

  return pool;
}

export async function closePool() {
  const current = pool;
  pool = null;
  await current?.end();
}
