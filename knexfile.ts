/**
 * Knex Configuration (knexfile.ts)
 *
 * Knex owns the schema (migrations) and the seed script's bulk inserts; the
 * request path talks to PostgreSQL through ConnectionPool instead.
 *
 * Connection settings come from src/core/config.ts, the same source the API
 * uses, and the config is keyed by NODE_ENV so the same code runs locally and
 * on a server.
 *
 * Migrations are TypeScript; the Knex CLI runs under tsx (`npm run migrate`).
 */
import type { Knex } from 'knex';
import path from 'node:path';

import { config } from './src/core/config';

function getConnection(): Knex.PgConnectionConfig {
  return {
    host: config.database.host,
    port: config.database.port,
    database: config.database.name,
    user: config.database.user,
    password: config.database.password,
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
    pool: { min: 1, max: 4 },
    migrations,
  },

  test: {
    client: 'pg',
    connection: getConnection(),
    pool: { min: 1, max: 2 },
    migrations,
  },

  production: {
    client: 'pg',
    connection: getConnection(),
    pool: { min: 1, max: 4 },
    migrations,
  },
};

export default knexConfig;
