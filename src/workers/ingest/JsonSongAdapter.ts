/**
 * JSON Data Source Adapter — Song Dump → SongRow
 * Layer: Workers (Ingest)
 * Pattern: Adapter Pattern (implements IDataSourceAdapter<RawSongRecord>)
 *
 * Song dumps arrive in one of two JSON layouts:
 *
 *   records  [{ "id": "5vYA1mW9g2Coh1HUFUSmlb", "title": "3AM", ... }, ...]
 *   columns  { "id": { "0": "5vYA...", "1": "..." }, "title": { "0": "3AM", ... } }
 *
 * toRecords() flattens either into a list of plain objects, parseSongRecord()
 * checks one of them against RawSongRecord, and the adapter maps a valid one
 * onto the `music_data` columns.
 *
 * Older dumps spell the acousticness key `accousticness`; both are accepted
 * and the correctly spelled one wins when a record carries both.
 */
import type { SongRow } from '@domain/entities/Song';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import { MAX_TITLE_LENGTH } from '@shared/constants';
import { fail, ok, type Result } from '@shared/result';
import { characterCount } from '@shared/text';
import { z } from 'zod/v4';

const feature = z.coerce.number().nullish();
const count = z.coerce.number().int().nullish();

export const rawSongRecordSchema = z.object({
  id: z
    .union([z.string(), z.number()])
    .transform((value) => String(value).trim())
    .pipe(z.string().min(1, 'id must not be empty').max(255)),
  title: z
    .string()
    .trim()
    .min(1, 'title must not be empty')
    .refine(
      (title) => characterCount(title) <= MAX_TITLE_LENGTH,
      `title must be at most ${MAX_TITLE_LENGTH} characters`,
    ),
  danceability: feature,
  energy: feature,
  mode: count,
  acousticness: feature,
  accousticness: feature,
  tempo: feature,
  duration_ms: count,
  num_sections: count,
  num_segments: count,
});

export type RawSongRecord = z.output<typeof rawSongRecordSchema>;

export class JsonSongAdapter implements IDataSourceAdapter<RawSongRecord> {
  normalize(raw: RawSongRecord): SongRow {
    return {
      id: raw.id,
      title: raw.title,
      danceability: raw.danceability ?? null,
      energy: raw.energy ?? null,
      mode: raw.mode ?? null,
      acousticness: raw.acousticness ?? raw.accousticness ?? null,
      tempo: raw.tempo ?? null,
      duration_ms: raw.duration_ms ?? null,
      num_sections: raw.num_sections ?? null,
      num_segments: raw.num_segments ?? null,
    };
  }
}

/** Validate one decoded JSON record; the error is a one-line reason for the report. */
export function parseSongRecord(value: unknown): Result<RawSongRecord, string> {
  const parsed = rawSongRecordSchema.safeParse(value);
  if (parsed.success) return ok(parsed.data);

  const reason = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`)
    .join('; ');
  return fail(reason);
}

/** Accept either supported layout and return one object per song. */
export function toRecords(data: unknown): unknown[] {
  if (Array.isArray(data)) return data;

  if (!isPlainObject(data)) {
    throw new Error('Expected a JSON array of songs or a column-oriented object');
  }

  const rows = new Map<string, Record<string, unknown>>();
  for (const [column, cells] of Object.entries(data)) {
    if (!isPlainObject(cells)) {
      throw new Error(`Column "${column}" must map row keys to values`);
    }
    for (const [rowKey, value] of Object.entries(cells)) {
      const row = rows.get(rowKey) ?? {};
      row[column] = value;
      rows.set(rowKey, row);
    }
  }
  return [...rows.values()];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
