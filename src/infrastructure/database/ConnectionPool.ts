/**
 * Database Connection Pool
 * Layer: Infrastructure
 *
 * A bounded set of reusable connections with an explicit lifecycle:
 *
 *   init()      build the driver pool and warm `min` connections (fails fast
 *               with ConnectFailedError if the database is unreachable)
 *   acquire()   borrow a connection; waits at most acquireTimeoutMs before
 *               PoolExhaustedError
 *   release()   return it, or destroy it if it broke while borrowed; a
 *               replacement is opened in the background while below `min`
 *   shutdown()  close everything (SIGTERM / test cleanup)
 *
 * withConnection() is the scoped form the repository uses: whatever `work`
 * does, the connection goes back to the pool.
 *
 * The driver (pg.Pool in production, a stand-in in tests) grows lazily and
 * never past `max`. The bookkeeping here only changes inside synchronous code
 * on the event loop, so concurrent requests cannot interleave an acquire and
 * a release; the borrowed connections themselves run their queries in parallel.
 *
 * One instance per process. In the clustered server every worker builds its
 * own, since processes cannot share sockets.
 */
import type { Logger } from '@core/logger';
import { ConnectFailedError, DatabaseError, PoolExhaustedError } from '@shared/errors/AppError';

import { DatabaseConnection, type DriverClient, type QueryExecutor } from './DatabaseConnection';

export interface PoolOptions {
  min: number;
  max: number;
  acquireTimeoutMs: number;
  idleTimeoutMs: number;
}

/** The slice of pg.Pool the pool relies on. */
export interface DriverPool {
  connect(): Promise<DriverClient>;
  end(): Promise<void>;
  readonly totalCount: number;
  readonly idleCount: number;
  readonly waitingCount: number;
}

export type DriverFactory = (options: PoolOptions) => DriverPool;

/** What data-access code depends on: a way to run work on a borrowed connection. */
export interface ConnectionProvider {
  withConnection<T>(work: (conn: QueryExecutor) => Promise<T>): Promise<T>;
}

export interface PoolStats {
  total: number;
  idle: number;
  waiting: number;
  borrowed: number;
}

type PoolState = 'created' | 'ready' | 'closed';

/** pg-pool's message when a queued connect() outlives connectionTimeoutMillis. */
const ACQUIRE_TIMEOUT_PATTERN = /timeout exceeded when trying to connect/i;

export class ConnectionPool implements ConnectionProvider {
  private driver: DriverPool | null = null;
  private state: PoolState = 'created';
  private readonly borrowed = new Set<DatabaseConnection>();
  private nextLeaseId = 1;
  private warmUp: Promise<void> | null = null;

  constructor(
    private readonly options: PoolOptions,
    private readonly createDriver: DriverFactory,
    private readonly log: Logger,
  ) {}

  get isReady(): boolean {
    return this.state === 'ready';
  }

  /** Concurrent callers share one warm-up and see the same outcome. */
  async init(): Promise<void> {
    if (this.state === 'closed') {
      throw new ConnectFailedError('Connection pool has been shut down');
    }
    this.warmUp ??= this.warm();
    return this.warmUp;
  }

  private async warm(): Promise<void> {
    this.driver = this.createDriver(this.options);
    this.state = 'ready';

    const warmed = await Promise.allSettled(
      Array.from({ length: this.options.min }, () => this.acquire()),
    );
    for (const attempt of warmed) {
      if (attempt.status === 'fulfilled') this.release(attempt.value);
    }

    const failure = warmed.find(
      (attempt): attempt is PromiseRejectedResult => attempt.status === 'rejected',
    );
    if (failure) {
      await this.shutdown();
      const reason: unknown = failure.reason;
      const detail = reason instanceof Error ? reason.message : String(reason);
      throw new ConnectFailedError(`Could not warm the connection pool: ${detail}`, reason);
    }

    this.log.info(
      { min: this.options.min, max: this.options.max },
      'Database connection pool initialized',
    );
  }

  async acquire(): Promise<DatabaseConnection> {
    const driver = this.requireDriver();

    let client: DriverClient;
    try {
      client = await driver.connect();
    } catch (err) {
      throw this.toAcquireError(err);
    }

    if (this.state !== 'ready') {
      client.release(true);
      throw new ConnectFailedError('Connection pool shut down while waiting for a connection');
    }

    const conn = new DatabaseConnection(client, this.nextLeaseId++, this.log);
    this.borrowed.add(conn);
    this.log.debug({ leaseId: conn.leaseId, ...this.stats() }, 'Connection acquired');
    return conn;
  }

  release(conn: DatabaseConnection): void {
    if (!this.borrowed.delete(conn)) {
      this.log.warn(
        { leaseId: conn.leaseId },
        'Ignoring release of a connection this pool did not lend',
      );
      return;
    }

    conn.detach();

    if (conn.isBroken) {
      conn.client.release(conn.brokenReason ?? true);
      this.log.warn({ leaseId: conn.leaseId }, 'Discarded broken connection');
      this.replenish();
      return;
    }

    conn.client.release();
    this.log.debug({ leaseId: conn.leaseId }, 'Connection released');
  }

  async withConnection<T>(work: (conn: QueryExecutor) => Promise<T>): Promise<T> {
    const conn = await this.acquire();
    try {
      return await work(conn);
    } finally {
      this.release(conn);
    }
  }

  async shutdown(): Promise<void> {
    if (this.state === 'closed') return;

    const driver = this.driver;
    this.state = 'closed';
    this.driver = null;

    if (this.borrowed.size > 0) {
      this.log.warn(
        { borrowed: this.borrowed.size },
        'Closing pool with connections still borrowed',
      );
    }
    if (driver) {
      await driver.end();
      this.log.info('Database connection pool closed');
    }
  }

  stats(): PoolStats {
    return {
      total: this.driver?.totalCount ?? 0,
      idle: this.driver?.idleCount ?? 0,
      waiting: this.driver?.waitingCount ?? 0,
      borrowed: this.borrowed.size,
    };
  }

  private requireDriver(): DriverPool {
    if (this.state !== 'ready' || !this.driver) {
      throw new ConnectFailedError(
        this.state === 'closed'
          ? 'Connection pool has been shut down'
          : 'Connection pool is not initialized',
      );
    }
    return this.driver;
  }

  private toAcquireError(err: unknown): DatabaseError {
    if (err instanceof DatabaseError) return err;
    const message = err instanceof Error ? err.message : String(err);
    if (ACQUIRE_TIMEOUT_PATTERN.test(message)) {
      this.log.warn(this.stats(), 'Timed out waiting for a database connection');
      return new PoolExhaustedError(this.options.acquireTimeoutMs, this.options.max);
    }
    this.log.error({ err }, 'Failed to open a database connection');
    return new ConnectFailedError(`Could not open a database connection: ${message}`, err);
  }

  /** Top the pool back up to `min` after a broken connection was thrown away. */
  private replenish(): void {
    const driver = this.driver;
    if (this.state !== 'ready' || !driver || driver.totalCount >= this.options.min) return;

    void driver.connect().then(
      (client) => client.release(),
      (err: unknown) => this.log.warn({ err }, 'Could not replace discarded connection'),
    );
  }
}
