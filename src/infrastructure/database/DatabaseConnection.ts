/**
 * Database Connection Wrapper
 * Layer: Infrastructure
 *
 * One borrowed driver client plus the rules for talking to it:
 *
 *   - SQL always travels with driver placeholders ($1..$n) and a params array.
 *   - A driver failure becomes either ConnectionLostError (the socket is gone;
 *     the connection is marked broken and the pool destroys it on release) or
 *     QueryError (bad SQL, constraint violation, statement timeout).
 *   - A broken connection refuses further work immediately.
 *
 * The repository only sees the QueryExecutor interface; pg types stop here.
 */
import type { Logger } from '@core/logger';
import { ConnectionLostError, QueryError } from '@shared/errors/AppError';

export type SqlParam = string | number | boolean | Date | null;

/** The slice of a pg PoolClient this wrapper relies on. */
export interface DriverClient {
  query(text: string, values?: unknown[]): Promise<DriverResult>;
  release(err?: Error | boolean): void;
  on(event: 'error', listener: (err: Error) => void): unknown;
  off(event: 'error', listener: (err: Error) => void): unknown;
}

export interface DriverResult {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

export interface QueryOutcome {
  rows: Record<string, unknown>[];
  rowCount: number;
}

export interface QueryExecutor {
  execute(sql: string, params?: readonly SqlParam[]): Promise<QueryOutcome>;
}

export class DatabaseConnection implements QueryExecutor {
  private lost: ConnectionLostError | null = null;

  constructor(
    readonly client: DriverClient,
    readonly leaseId: number,
    private readonly log: Logger,
  ) {
    this.client.on('error', this.onClientError);
  }

  get isBroken(): boolean {
    return this.lost !== null;
  }

  get brokenReason(): ConnectionLostError | null {
    return this.lost;
  }

  async execute(sql: string, params: readonly SqlParam[] = []): Promise<QueryOutcome> {
    if (this.lost) {
      throw new ConnectionLostError(`Connection #${this.leaseId} is no longer usable`, this.lost);
    }

    const startMs = Date.now();
    try {
      const result = await this.client.query(sql, [...params]);
      this.log.debug(
        { leaseId: this.leaseId, rowCount: result.rowCount, durationMs: Date.now() - startMs },
        'Query executed',
      );
      return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
    } catch (err) {
      throw this.classify(err);
    }
  }

  /** Stop listening on the driver client before it goes back to the pool. */
  detach(): void {
    this.client.off('error', this.onClientError);
  }

  private readonly onClientError = (err: Error): void => {
    this.log.warn({ leaseId: this.leaseId, err }, 'Borrowed connection reported an error');
    this.lost = new ConnectionLostError(err.message, err);
  };

  private classify(err: unknown): ConnectionLostError | QueryError {
    const message = err instanceof Error ? err.message : String(err);
    if (isConnectionLoss(err)) {
      this.lost = new ConnectionLostError(message, err);
      this.log.warn({ leaseId: this.leaseId, err }, 'Connection lost mid-query');
      return this.lost;
    }
    return new QueryError(message, sqlState(err), err);
  }
}

const CONNECTION_LOSS_CODES = new Set(['ECONNRESET', 'EPIPE', 'ETIMEDOUT', 'ECONNREFUSED', '57P01']);

/**
 * True when the error means the socket is unusable rather than the statement
 * being wrong. SQLSTATE class 08 is "connection exception".
 */
export function isConnectionLoss(err: unknown): boolean {
  const code = errorCode(err);
  if (code && (CONNECTION_LOSS_CODES.has(code) || code.startsWith('08'))) return true;

  const message = err instanceof Error ? err.message : String(err);
  return /connection terminated|terminated unexpectedly|connection closed|connection.*reset|not queryable/i.test(
    message,
  );
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** pg's DatabaseError carries a five-character SQLSTATE in `code`. */
function sqlState(err: unknown): string | undefined {
  const code = errorCode(err);
  return code && /^[0-9A-Z]{5}$/.test(code) ? code : undefined;
}
