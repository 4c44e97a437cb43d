import { pino } from 'pino';
import { env } from '../config/env.js';
import { closePool } from '../db/pool.js';
import { runMigrations } from '../db/migrator.js';

const log = pino({ name: 'migrate', level: env.LOG_LEVEL });

async function main() {
  const result = await runMigrations();
  if (!result.ran) {
    log.warn('DATABASE_URL is not configured; nothing to migrate');
    return;
  }

  if (result.applied.length === 0) {
    log.info('schema is up to date');
    return;
  }

  log.info({ applied: result.applied }, 'migrations applied');
}

main()
  .catch((error: unknown) => {
    log.error({ err: error }, 'migration failed');
    process.exitCode = 1;
  })
  .finally(async () => {
    await closePool();
  });
