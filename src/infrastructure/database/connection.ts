/**
 * Lazily created knex pool for the record cache, one per process (and so one
 * per cluster worker). knex opens no connection until the first query, so a
 * run that never stores or reads the cache never touches PostgreSQL.
 */
import knex, { Knex } from 'knex';
import { config } from '@core/config';
import { logger } from '@core/logger';

const ACQUIRE_TIMEOUT_MS = 10_000;

let pool: Knex | undefined;

export function getDbConnection(): Knex {
  pool ??= createPool();
  return pool;
}

function createPool(): Knex {
  const { url, ssl, pool: size } = config.database;
  const created = knex({
    client: 'pg',
    connection: { connectionString: url, ssl: ssl ? { rejectUnauthorized: false } : false },
    pool: { min: size.min, max: size.max },
    acquireConnectionTimeout: ACQUIRE_TIMEOUT_MS,
  });

  const { hostname, pathname } = new URL(url);
  logger.info({ host: hostname, database: pathname.slice(1) }, 'Record cache pool created');
  return created;
}

/** Closes the pool if one was created; safe to call more than once. */
export async function destroyDbConnection(): Promise<void> {
  if (!pool) return;
  const closing = pool;
  pool = undefined;
  await closing.destroy();
  logger.info('Record cache pool closed');
}
