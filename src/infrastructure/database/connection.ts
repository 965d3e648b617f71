/**
 * Database Connection Pool — Singleton
 * Layer: Infrastructure
 * Pattern: Singleton
 *
 * One Knex pool per process, shared by the mapping repository and the
 * backfill queue. `destroyDbConnection()` runs on shutdown of the drain script.
 */
import knex, { Knex } from 'knex';
import { config } from '@core/config';
import { logger } from '@core/logger';

let instance: Knex | null = null;

export function getDbConnection(): Knex {
  if (!instance) {
    instance = knex({
      client: 'pg',
      connection: {
        connectionString: config.database.url,
        ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
      },
      pool: {
        min: config.database.pool.min,
        max: config.database.pool.max,
        afterCreate: (conn: unknown, done: (err: Error | null, conn: unknown) => void) => {
          logger.debug('New database connection established');
          done(null, conn);
        },
      },
      acquireConnectionTimeout: 10000,
    });

    logger.info({ ssl: config.database.ssl }, 'Database connection pool initialized');
  }

  return instance;
}

/** Tears down the pool. */
export async function destroyDbConnection(): Promise<void> {
  if (instance) {
    await instance.destroy();
    instance = null;
    logger.info('Database connection pool destroyed');
  }
}
