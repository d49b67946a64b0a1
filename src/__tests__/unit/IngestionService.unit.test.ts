/**
 * Unit Tests — IngestionService
 *
 * The sink is a jest.fn() double, so these only check the pipeline: valid
 * records reach the sink normalized, invalid ones are counted and skipped,
 * and the sink's own totals end up in the result.
 */
import { IngestionService } from '@application/services/IngestionService';
import type { SongRow } from '@domain/entities/Song';
import { JsonSongAdapter } from '@workers/ingest/JsonSongAdapter';
import type { SongSink, WriteTotals } from '@workers/ingest/SongBatchWriter';

import { silentLogger } from '../helpers/fakeDriver';

function createSink(totals: WriteTotals): jest.Mocked<SongSink> {
  return {
    add: jest.fn<Promise<void>, [SongRow]>(async () => undefined),
    flush: jest.fn<Promise<void>, []>(async () => undefined),
    close: jest.fn<Promise<WriteTotals>, []>(async () => totals),
  };
}

describe('IngestionService', () => {
  it('should write valid records and count invalid ones', async () => {
    const sink = createSink({ inserted: 1, skipped: 1 });
    const service = new IngestionService(new JsonSongAdapter(), sink, silentLogger);

    const result = await service.ingest([
      { id: 'song-0001', title: '3AM', accousticness: 0.4 },
      { id: 'song-0002' },
      { id: 'song-0003', title: 'Paper Planes' },
    ]);

    expect(sink.add).toHaveBeenCalledTimes(2);
    expect(sink.add.mock.calls[0]?.[0]).toMatchObject({ id: 'song-0001', acousticness: 0.4 });
    expect(sink.add.mock.calls[1]?.[0]).toMatchObject({ id: 'song-0003', title: 'Paper Planes' });
    expect(sink.close).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({
      totalRead: 3,
      totalInserted: 1,
      totalSkipped: 1,
      totalInvalid: 1,
    });
  });

  it('should report progress every `progressEvery` records', async () => {
    const sink = createSink({ inserted: 5, skipped: 0 });
    const service = new IngestionService(new JsonSongAdapter(), sink, silentLogger, 2);
    const onProgress = jest.fn();
    const records = Array.from({ length: 5 }, (_, i) => ({ id: `song-${i}`, title: `Song ${i}` }));

    await service.ingest(records, onProgress);

    expect(onProgress.mock.calls).toEqual([[2], [4]]);
  });

  it('should propagate a sink failure', async () => {
    const sink = createSink({ inserted: 0, skipped: 0 });
    sink.close.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5432'));
    const service = new IngestionService(new JsonSongAdapter(), sink, silentLogger);

    await expect(service.ingest([{ id: 'song-0001', title: '3AM' }])).rejects.toThrow(
      'connect ECONNREFUSED',
    );
  });
});
