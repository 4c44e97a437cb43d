import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { PoolClient } from 'pg';
import { getPool } from './pool.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// src/db and dist/db both sit two levels below the repository root
const migrationsDir = path.join(__dirname, '../../migrations');

// arbitrary constant shared by every instance that migrates this schema
const MIGRATION_LOCK_KEY = 7_310_442;

export type MigrationResult = {
  ran: boolean;
  applied: string[];
};

async function ensureMigrationsTable(client: PoolClient) {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

export async function listMigrationFiles(dir = migrationsDir): Promise<string[]> {
  return (await readdir(dir)).filter((name) => name.endsWith('.sql')).sort();
}

/** Applies pending forward-only SQL migrations in filename order, one transaction for all. */
export async function runMigrations(): Promise<MigrationResult> {
  const pool = getPool();
  if (!pool) {
    return { ran: false, applied: [] };
  }

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query('SELECT pg_advisory_xact_lock($1)', [MIGRATION_LOCK_KEY]);
    await ensureMigrationsTable(client);

    const appliedVersions = await client.query<{ version: string }>('SELECT version FROM schema_migrations');
    const done = new Set(appliedVersions.rows.map((row) => row.version));
    const applied: string[] = [];

    for (const file of await listMigrationFiles()) {
      if (done.has(file)) {
        continue;
      }

      await client.query(await readFile(path.join(migrationsDir, file), 'utf8'));
      await client.query('INSERT INTO schema_migrations(version) VALUES ($1)', [file]);
      applied.push(file);
    }

    await client.query('COMMIT');
    return { ran: true, applied };
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
