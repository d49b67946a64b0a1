/**
 * Unit Tests — pg Driver Factory
 *
 * pg.Pool is replaced with a jest.fn() constructor, so these tests only check
 * what createPgDriver hands the driver: the `max` bound, warm size and the two
 * timeouts come from PoolOptions, the credentials from DatabaseConfig.
 */
import type { DatabaseConfig } from '@core/config';
import { createPgDriver } from '@infrastructure/database/connection';
import type { PoolOptions } from '@infrastructure/database/ConnectionPool';
import { Pool } from 'pg';

import { silentLogger } from '../helpers/fakeDriver';

jest.mock('pg', () => ({
  Pool: jest.fn().mockImplementation(() => ({ on: jest.fn() })),
}));

const db: DatabaseConfig = {
  host: 'db.internal',
  port: 6543,
  name: 'music',
  user: 'api',
  password: 'test-secret',
  ssl: false,
  pool: { min: 1, max: 4, acquireTimeoutMs: 2500, idleTimeoutMs: 10_000 },
  statementTimeoutMs: 0,
};

const options: PoolOptions = { min: 2, max: 7, acquireTimeoutMs: 1500, idleTimeoutMs: 20_000 };

describe('createPgDriver', () => {
  const MockPool = jest.mocked(Pool);

  beforeEach(() => {
    MockPool.mockClear();
  });

  it('should bound the pg pool by the pool options', () => {
    createPgDriver(db, silentLogger)(options);

    expect(MockPool).toHaveBeenCalledTimes(1);
    expect(MockPool.mock.calls[0]?.[0]).toMatchObject({
      min: 2,
      max: 7,
      connectionTimeoutMillis: 1500,
      idleTimeoutMillis: 20_000,
    });
  });

  it('should pass the connection settings through without a statement timeout by default', () => {
    createPgDriver(db, silentLogger)(options);

    const settings = MockPool.mock.calls[0]?.[0];
    expect(settings).toMatchObject({
      host: 'db.internal',
      port: 6543,
      database: 'music',
      user: 'api',
      password: 'test-secret',
      ssl: false,
    });
    expect(settings?.statement_timeout).toBeUndefined();
  });

  it('should set the statement timeout when one is configured', () => {
    createPgDriver({ ...db, statementTimeoutMs: 3000 }, silentLogger)(options);

    expect(MockPool.mock.calls[0]?.[0]?.statement_timeout).toBe(3000);
  });
});
