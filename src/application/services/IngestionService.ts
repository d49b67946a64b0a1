/**
 * Ingestion Service — Load a Song Dump into `music_data`
 * Layer: Application
 * Pattern: Facade Pattern
 *
 * One call, ingest(records), hides the pipeline:
 *
 *   decoded JSON records → parseSongRecord (zod) → JsonSongAdapter → SongSink
 *
 * A record that fails validation is logged with its position and counted
 * as invalid; the rest of the file still loads. Duplicate ids (already in
 * the table, or repeated in the file) are counted as skipped by the sink.
 *
 * The seed CLI is the only caller. The HTTP API never writes songs.
 */
import type { Logger } from '@core/logger';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import type { IngestionResult } from '@shared/types';
import { parseSongRecord, type RawSongRecord } from '@workers/ingest/JsonSongAdapter';
import type { SongSink } from '@workers/ingest/SongBatchWriter';

export type ProgressListener = (processed: number) => void;

export class IngestionService {
  constructor(
    private readonly adapter: IDataSourceAdapter<RawSongRecord>,
    private readonly sink: SongSink,
    private readonly log: Logger,
    private readonly progressEvery = 1000,
  ) {}

  async ingest(records: readonly unknown[], onProgress?: ProgressListener): Promise<IngestionResult> {
    const startMs = Date.now();
    let invalid = 0;

    this.log.info({ records: records.length }, 'Starting song ingestion');

    for (const [index, value] of records.entries()) {
      const parsed = parseSongRecord(value);
      if (parsed.ok) {
        await this.sink.add(this.adapter.normalize(parsed.value));
      } else {
        invalid++;
        this.log.warn({ index, reason: parsed.error }, 'Skipping invalid song record');
      }

      if (onProgress && (index + 1) % this.progressEvery === 0) onProgress(index + 1);
    }

    const { inserted, skipped } = await this.sink.close();
    const result: IngestionResult = {
      totalRead: records.length,
      totalInserted: inserted,
      totalSkipped: skipped,
      totalInvalid: invalid,
      durationMs: Date.now() - startMs,
    };

    this.log.info(result, 'Song ingestion complete');
    return result;
  }
}
