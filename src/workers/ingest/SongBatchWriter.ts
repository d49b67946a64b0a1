/**
 * Song Batch Writer — Chunked Bulk Insert
 * Layer: Workers (Ingest)
 *
 * Buffers SongRows and writes them with one multi-row INSERT per batch
 * instead of one statement per song. Each batch runs inside a transaction,
 * so a retried batch never leaves half of itself behind.
 *
 * `ON CONFLICT (id) DO NOTHING` makes a re-run of the seed harmless: songs
 * already present (including their star ratings) are left alone and counted
 * as skipped. RETURNING id tells the two apart.
 *
 * Connection-level failures (reset socket, server restart) retry the whole
 * batch with exponential backoff; anything else fails the run.
 */
import type { SongRow } from '@domain/entities/Song';
import { isConnectionLoss } from '@infrastructure/database/DatabaseConnection';
import { SONGS_TABLE } from '@shared/constants';
import type { Knex } from 'knex';

/** Where normalized rows go; the service only needs this much. */
export interface SongSink {
  add(row: SongRow): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<WriteTotals>;
}

export interface WriteTotals {
  inserted: number;
  skipped: number;
}

export interface BatchWriterOptions {
  batchSize: number;
  retryAttempts: number;
  retryDelayMs: number;
}

const DEFAULT_OPTIONS: BatchWriterOptions = {
  batchSize: 1000,
  retryAttempts: 3,
  retryDelayMs: 1000,
};

/** PostgreSQL caps a statement at 65,535 bind parameters. */
const PG_MAX_BIND_PARAMS = 65_535;
const SONG_COLUMNS = 10;
const MAX_ROWS_PER_INSERT = Math.floor(PG_MAX_BIND_PARAMS / SONG_COLUMNS);

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class SongBatchWriter implements SongSink {
  private buffer: SongRow[] = [];
  private inserted = 0;
  private skipped = 0;
  private readonly options: BatchWriterOptions;

  constructor(
    private readonly db: Knex,
    options?: Partial<BatchWriterOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async add(row: SongRow): Promise<void> {
    this.buffer.push(row);
    if (this.buffer.length >= this.options.batchSize) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;
    const batch = this.buffer.splice(0);

    const { retryAttempts, retryDelayMs } = this.options;
    for (let attempt = 1; attempt <= retryAttempts; attempt++) {
      try {
        const written = await this.db.transaction((trx) => this.insertBatch(trx, batch));
        this.inserted += written;
        this.skipped += batch.length - written;
        return;
      } catch (err) {
        if (!isConnectionLoss(err) || attempt === retryAttempts) throw err;
        await delay(retryDelayMs * 2 ** (attempt - 1));
      }
    }
  }

  /** Flush what is left and report totals. The Knex instance belongs to the caller. */
  async close(): Promise<WriteTotals> {
    await this.flush();
    return { inserted: this.inserted, skipped: this.skipped };
  }

  private async insertBatch(trx: Knex.Transaction, batch: SongRow[]): Promise<number> {
    const chunkSize = Math.min(this.options.batchSize, MAX_ROWS_PER_INSERT);
    let written = 0;
    for (let i = 0; i < batch.length; i += chunkSize) {
      const returned: unknown[] = await trx(SONGS_TABLE)
        .insert(batch.slice(i, i + chunkSize))
        .onConflict('id')
        .ignore()
        .returning('id');
      written += returned.length;
    }
    return written;
  }
}
