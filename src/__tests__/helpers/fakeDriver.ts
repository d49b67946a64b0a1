/**
 * Fake Database Driver
 * Layer: Test Helpers
 *
 * In-process stand-ins for pg.Pool / PoolClient behind the DriverPool and
 * DriverClient interfaces, plus a scripted ConnectionProvider for repository
 * tests. Nothing here opens a socket.
 *
 * FakeDriverPool keeps pg-pool's bookkeeping: connect() reuses an idle client,
 * opens a new one below `max` or queues, release() hands the client to the
 * next waiter or back to idle, release(err) destroys it.
 */
import type { ConnectionProvider, DriverPool } from '@infrastructure/database/ConnectionPool';
import type {
  DriverClient,
  DriverResult,
  QueryExecutor,
  QueryOutcome,
  SqlParam,
} from '@infrastructure/database/DatabaseConnection';
import pino from 'pino';

export const silentLogger = pino({ level: 'silent' });

type ErrorListener = (err: Error) => void;

export class FakeClient implements DriverClient {
  readonly query = jest.fn<Promise<DriverResult>, [text: string, values?: unknown[]]>();
  readonly release = jest.fn<void, [err?: Error | boolean]>();
  private readonly listeners = new Set<ErrorListener>();

  constructor(readonly name: string) {}

  on(_event: 'error', listener: ErrorListener): this {
    this.listeners.add(listener);
    return this;
  }

  off(_event: 'error', listener: ErrorListener): this {
    this.listeners.delete(listener);
    return this;
  }

  get errorListenerCount(): number {
    return this.listeners.size;
  }

  /** What pg does when the socket of an idle or busy client dies. */
  emitError(err: Error): void {
    for (const listener of this.listeners) listener(err);
  }
}

export class FakeDriverPool implements DriverPool {
  totalCount = 0;
  readonly opened: FakeClient[] = [];
  /** Highest totalCount ever reached. */
  peakCount = 0;
  private readonly idle: FakeClient[] = [];
  private readonly waiters: Array<(client: FakeClient) => void> = [];
  /** While set, every connect() rejects with it. */
  connectError: Error | null = null;

  /** `max` bounds open clients like pg-pool's; extra connect() calls queue. */
  constructor(private readonly max = Number.POSITIVE_INFINITY) {}

  readonly end = jest.fn(async (): Promise<void> => {
    this.idle.length = 0;
  });

  readonly connect = jest.fn(async (): Promise<DriverClient> => {
    if (this.connectError) throw this.connectError;

    const reused = this.idle.pop();
    if (reused) return reused;
    if (this.totalCount < this.max) return this.open();

    return new Promise<FakeClient>((resolve) => {
      this.waiters.push(resolve);
    });
  });

  get idleCount(): number {
    return this.idle.length;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }

  private open(): FakeClient {
    const client = new FakeClient(`client-${this.opened.length + 1}`);
    client.release.mockImplementation((err) => {
      if (err) {
        this.totalCount--;
        const waiter = this.waiters.shift();
        if (waiter) waiter(this.open());
        return;
      }
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(client);
      } else {
        this.idle.push(client);
      }
    });
    this.opened.push(client);
    this.totalCount++;
    this.peakCount = Math.max(this.peakCount, this.totalCount);
    return client;
  }
}

/** A ConnectionProvider whose every connection answers from one scripted `execute` mock. */
export class ScriptedConnectionProvider implements ConnectionProvider {
  readonly execute = jest.fn<Promise<QueryOutcome>, [sql: string, params?: readonly SqlParam[]]>();
  /** Errors thrown by withConnection itself (before `work` runs), one per call. */
  readonly acquireFailures: Error[] = [];
  acquisitions = 0;

  async withConnection<T>(work: (conn: QueryExecutor) => Promise<T>): Promise<T> {
    this.acquisitions++;
    const failure = this.acquireFailures.shift();
    if (failure) throw failure;
    return work({ execute: (sql, params) => this.execute(sql, params) });
  }
}

export function rowsOf(...rows: Record<string, unknown>[]): QueryOutcome {
  return { rows, rowCount: rows.length };
}
