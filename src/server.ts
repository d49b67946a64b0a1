/**
 * Server Entry Point — Clustering & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * `npm start` lands here. The PRIMARY process serves nothing itself: it forks
 * WEB_CONCURRENCY workers (default: one per CPU core) and replaces any that
 * die. Each WORKER runs its own Express app and its own ConnectionPool, and
 * the kernel spreads incoming connections across them.
 *
 * Worker startup order matters: the pool is initialized (min connections
 * opened) BEFORE the port is bound, so a worker that cannot reach PostgreSQL
 * exits instead of answering every request with a 500.
 *
 * Graceful shutdown on SIGTERM/SIGINT, per worker:
 *   1. server.close(): stop accepting connections, let in-flight requests finish
 *   2. pool.shutdown(): close every database connection
 *   3. exit 0
 */
import cluster from 'node:cluster';
import os from 'node:os';

import { config } from '@core/config';
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ConnectionPool } from '@infrastructure/database/ConnectionPool';
import { createApp } from '@interfaces/http/app';

const numWorkers = config.cluster.workers || os.cpus().length;

async function startWorker(): Promise<void> {
  const pool = container.resolve<ConnectionPool>(TOKENS.ConnectionPool);
  await pool.init();

  const app = createApp();
  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Worker listening on :${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');

    server.close(() => {
      pool.shutdown().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Error while closing the connection pool');
          process.exit(1);
        },
      );
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

if (cluster.isPrimary) {
  logger.info(
    { pid: process.pid, workers: numWorkers },
    `Primary process starting >> forking ${numWorkers} workers`,
  );

  for (let i = 0; i < numWorkers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    logger.warn({ pid: worker.process.pid, code, signal }, 'Worker died, restarting');
    cluster.fork();
  });
} else {
  startWorker().catch((err: unknown) => {
    logger.fatal({ err, pid: process.pid }, 'Worker failed to start');
    process.exit(1);
  });
}
