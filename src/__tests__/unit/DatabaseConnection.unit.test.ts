/**
 * Unit Tests — DatabaseConnection
 *
 * The wrapper's job is classification: a driver failure is either a dead
 * socket (ConnectionLostError, connection marked broken) or a bad statement
 * (QueryError, connection still usable).
 */
import { DatabaseConnection, isConnectionLoss } from '@infrastructure/database/DatabaseConnection';
import { ConnectionLostError, QueryError } from '@shared/errors/AppError';

import { FakeClient, silentLogger } from '../helpers/fakeDriver';

function driverError(message: string, code?: string): Error {
  return Object.assign(new Error(message), code === undefined ? {} : { code });
}

describe('DatabaseConnection', () => {
  let client: FakeClient;
  let conn: DatabaseConnection;

  beforeEach(() => {
    client = new FakeClient('client-1');
    conn = new DatabaseConnection(client, 1, silentLogger);
  });

  it('should pass SQL and parameters through to the driver', async () => {
    client.query.mockResolvedValue({ rows: [{ id: 'song-0001' }], rowCount: 1 });

    const result = await conn.execute('SELECT id FROM music_data WHERE id = $1', ['song-0001']);

    expect(client.query).toHaveBeenCalledWith('SELECT id FROM music_data WHERE id = $1', [
      'song-0001',
    ]);
    expect(result).toEqual({ rows: [{ id: 'song-0001' }], rowCount: 1 });
  });

  it('should fall back to the row count when the driver reports none', async () => {
    client.query.mockResolvedValue({ rows: [{ total: '3' }], rowCount: null });

    const result = await conn.execute('SELECT COUNT(*) AS total FROM music_data');

    expect(result.rowCount).toBe(1);
    expect(client.query).toHaveBeenCalledWith('SELECT COUNT(*) AS total FROM music_data', []);
  });

  it('should turn statement errors into QueryError and stay usable', async () => {
    client.query.mockRejectedValueOnce(driverError('syntax error at or near "SELEC"', '42601'));

    const error = await conn.execute('SELEC 1').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(QueryError);
    expect(error).toMatchObject({ kind: 'QueryError', code: '42601' });
    expect(conn.isBroken).toBe(false);
  });

  it('should mark the connection broken when the socket drops mid-query', async () => {
    client.query.mockRejectedValueOnce(driverError('read ECONNRESET', 'ECONNRESET'));

    await expect(conn.execute('SELECT 1')).rejects.toBeInstanceOf(ConnectionLostError);

    expect(conn.isBroken).toBe(true);
    expect(conn.brokenReason).toBeInstanceOf(ConnectionLostError);
  });

  it('should refuse further work once broken without touching the driver', async () => {
    client.query.mockRejectedValueOnce(driverError('Connection terminated unexpectedly'));
    await expect(conn.execute('SELECT 1')).rejects.toBeInstanceOf(ConnectionLostError);

    await expect(conn.execute('SELECT 2')).rejects.toThrow('Connection #1 is no longer usable');
    expect(client.query).toHaveBeenCalledTimes(1);
  });

  it('should mark the connection broken when the client emits an error', () => {
    client.emitError(new Error('terminating connection due to administrator command'));

    expect(conn.isBroken).toBe(true);
  });

  it('should stop listening for client errors once detached', () => {
    expect(client.errorListenerCount).toBe(1);

    conn.detach();

    expect(client.errorListenerCount).toBe(0);
  });
});

describe('isConnectionLoss()', () => {
  it.each([
    ['ECONNRESET', driverError('read ECONNRESET', 'ECONNRESET')],
    ['EPIPE', driverError('write EPIPE', 'EPIPE')],
    ['admin shutdown', driverError('terminating connection', '57P01')],
    ['connection exception class', driverError('connection failure', '08006')],
    ['terminated message', driverError('Connection terminated unexpectedly')],
    ['closed client', driverError('Client has encountered a connection error and is not queryable')],
  ])('should treat %s as a lost connection', (_label, err) => {
    expect(isConnectionLoss(err)).toBe(true);
  });

  it.each([
    ['unique violation', driverError('duplicate key value violates unique constraint', '23505')],
    ['syntax error', driverError('syntax error at or near "SELEC"', '42601')],
    ['statement timeout', driverError('canceling statement due to statement timeout', '57014')],
  ])('should not treat %s as a lost connection', (_label, err) => {
    expect(isConnectionLoss(err)).toBe(false);
  });
});
