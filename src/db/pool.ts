import { Pool } from 'pg';
import { env } from '../config/env.js';

let pool: Pool | null = null;

export type PoolErrorHandler = (error: Error) => void;

/**
 * Lazily creates the shared pool. Idle client errors are reported through
 * `onError` instead of crashing the process.
 */
export function getPool(onError?: PoolErrorHandler): Pool | null {
  if (!env.DATABASE_URL) {
    return null;
  }

  if (!pool) {
    pool = new Pool({ connectionString: env.DATABASE_URL, application_name: 'vitals-call-bridge' });
    pool.on('error', (error) => {
      onError?.(error);
    });
  }

  return pool;
}

export async function closePool() {
  if (!pool) {
    return;
  }

  const closing = pool;
  pool = null;
  await closing.end();
}
