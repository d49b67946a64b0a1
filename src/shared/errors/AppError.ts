/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two families of failure flow through the service:
 *
 *   1. Domain errors — bad input, missing song, ambiguous title. Expected
 *      during normal operation and reported to the client as-is.
 *
 *   2. Infrastructure errors — pool exhausted, connect failure, dropped
 *      socket, rejected SQL. Reported as 500 with technical detail.
 *
 * Each class carries a literal `kind`, so the HTTP layer can switch over
 * `AppErrorKind` exhaustively; status codes live there, not here. Errors are
 * usually passed around as values inside a Result (see result.ts) rather than
 * thrown; only the pool and connection wrapper reject with them.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses of Error across compilation targets.
 */
export type AppErrorKind =
  | 'InvalidParameter'
  | 'InvalidRating'
  | 'NotFound'
  | 'AmbiguousTarget'
  | 'PoolExhausted'
  | 'ConnectFailed'
  | 'ConnectionLost'
  | 'QueryError'
  | 'Internal';

export class AppError extends Error {
  public readonly kind: AppErrorKind;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    kind: AppErrorKind = 'Internal',
    isOperational = true,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.kind = kind;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidParameterError extends AppError {
  declare readonly kind: 'InvalidParameter';

  constructor(message: string) {
    super(message, 'InvalidParameter');
  }
}

export class InvalidRatingError extends AppError {
  declare readonly kind: 'InvalidRating';

  constructor(message = 'Rating must be between 0 and 5') {
    super(message, 'InvalidRating');
  }
}

export class NotFoundError extends AppError {
  declare readonly kind: 'NotFound';

  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 'NotFound');
  }
}

/** A mutating operation whose lookup key resolves to more than one record. */
export class AmbiguousTargetError extends AppError {
  declare readonly kind: 'AmbiguousTarget';

  constructor(resource: string, identifier: string) {
    super(
      `${resource} title is ambiguous: ${identifier} matches more than one record`,
      'AmbiguousTarget',
    );
  }
}

export type DatabaseErrorKind = 'PoolExhausted' | 'ConnectFailed' | 'ConnectionLost' | 'QueryError';

/** Base for every failure raised below the DAO. */
export class DatabaseError extends AppError {
  declare readonly kind: DatabaseErrorKind;

  constructor(message: string, kind: DatabaseErrorKind, cause?: unknown) {
    super(message, kind, true, cause);
  }
}

export class PoolExhaustedError extends DatabaseError {
  declare readonly kind: 'PoolExhausted';

  constructor(waitedMs: number, max: number) {
    super(
      `No database connection became available within ${waitedMs}ms (pool max ${max})`,
      'PoolExhausted',
    );
  }
}

export class ConnectFailedError extends DatabaseError {
  declare readonly kind: 'ConnectFailed';

  constructor(message: string, cause?: unknown) {
    super(message, 'ConnectFailed', cause);
  }
}

export class ConnectionLostError extends DatabaseError {
  declare readonly kind: 'ConnectionLost';

  constructor(message: string, cause?: unknown) {
    super(message, 'ConnectionLost', cause);
  }
}

export class QueryError extends DatabaseError {
  declare readonly kind: 'QueryError';

  /** SQLSTATE reported by PostgreSQL, when there is one. */
  public readonly code: string | undefined;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message, 'QueryError', cause);
    this.code = code;
  }
}
