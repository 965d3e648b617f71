/**
 * Knex Configuration (knexfile.ts)
 *
 * Used by the Knex CLI (`npm run migrate`, `npm run migrate:rollback`) to
 * create the `company_mappings` cache and the `enrichment_requests` queue.
 * Connection settings come from src/core/config.ts (DATABASE_URL, DB_SSL,
 * DB_POOL_*), keyed by NODE_ENV.
 */

import type { Knex } from 'knex';

import { config } from './src/core/config';
import path from 'node:path';

function getConnection(): Knex.PgConnectionConfig {
  return {
    connectionString: config.database.url,
    ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
  };
}

const migrations: Knex.MigratorConfig = {
  directory: path.join(__dirname, 'src/infrastructure/database/migrations'),
  extension: 'ts',
};

const knexConfig: Record<string, Knex.Config> = {
  development: {
    client: 'pg',
    connection: getConnection(),
    pool: {
      min: config.database.pool.min,
      max: config.database.pool.max,
    },
    migrations,
  },

  test: {
    client: 'pg',
    connection: getConnection(),
    pool: { min: 0, max: 2 },
    migrations,
  },

  production: {
    client: 'pg',
    connection: getConnection(),
    pool: {
      min: config.database.pool.min,
      max: config.database.pool.max,
    },
    migrations,
  },
};

export default knexConfig;
