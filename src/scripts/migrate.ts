import { pino } from 'pino';
import { env } from '../config/env.js';
import { runMigrations } from '../db/migrator.js';
import { closePool, getPool } from '../db/pool.js';

const log = pino({ level: env.LOG_LEVEL, name: 'migrate' });

async function main() {
  const pool = getPool((error) => log.error({ err: error }, 'db.pool_error'));
  if (!pool) {
    log.warn('DATABASE_URL is not configured; skipping migrations');
    return;
  }

  const { applied } = await runMigrations(pool);
  if (applied.length === 0) {
    log.info('no new migrations');
    return;
  }

  log.info({ applied }, 'migrations applied');
}

main()
  .catch((error: unknown) => {
    log.error({ err: error }, 'migrations failed');
    process.exitCode = 1;
  })
  .finally(closePool);
