import type { SongRow } from '@domain/entities/Song';

/**
 * Data Source Adapter Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * Converts one raw record from an external dump into the row shape the
 * ingestion writer inserts. The writer does not care whether the source was
 * JSON, CSV or anything else; it only calls `normalize()`.
 *
 * `TRaw` is the shape a given adapter expects (JsonSongAdapter takes
 * RawSongRecord).
 */
export interface IDataSourceAdapter<TRaw = unknown> {
  normalize(raw: TRaw): SongRow;
}
