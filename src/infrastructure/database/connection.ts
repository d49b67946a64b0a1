/**
 * Connection Pool Factory
 * Layer: Infrastructure
 *
 * Binds ConnectionPool to the real driver: a pg.Pool built from
 * config.database. Nothing connects here; server.ts calls pool.init() once
 * the worker starts and pool.shutdown() on SIGTERM.
 *
 * Pool sizing comes from DB_POOL_MIN / DB_POOL_MAX. With N cluster workers
 * the database sees up to N * max connections, so keep max modest against
 * PostgreSQL's max_connections (100 by default).
 */
import { config, type DatabaseConfig } from '@core/config';
import { logger, type Logger } from '@core/logger';
import { Pool } from 'pg';

import { ConnectionPool, type DriverFactory, type DriverPool } from './ConnectionPool';

export function createPgDriver(db: DatabaseConfig, log: Logger): DriverFactory {
  return (options): DriverPool => {
    const pool = new Pool({
      host: db.host,
      port: db.port,
      database: db.name,
      user: db.user,
      password: db.password,
      ssl: db.ssl ? { rejectUnauthorized: false } : false,
      min: options.min,
      max: options.max,
      connectionTimeoutMillis: options.acquireTimeoutMs,
      idleTimeoutMillis: options.idleTimeoutMs,
      statement_timeout: db.statementTimeoutMs > 0 ? db.statementTimeoutMs : undefined,
      application_name: 'music-rating-api',
    });

    // Idle clients can die (server restart, network blip); without a listener pg rethrows.
    pool.on('error', (err) => {
      log.error({ err }, 'Idle database connection failed');
    });
    pool.on('connect', () => {
      log.debug('New database connection established');
    });

    return pool;
  };
}

export function createConnectionPool(): ConnectionPool {
  const log = logger.child({ component: 'db-pool' });
  log.info(
    { host: config.database.host, database: config.database.name, ...config.database.pool },
    'Configuring database connection pool',
  );
  return new ConnectionPool(config.database.pool, createPgDriver(config.database, log), log);
}
