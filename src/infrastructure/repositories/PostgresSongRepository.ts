/**
 * PostgreSQL Song Repository — Data Access Implementation
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements ISongRepository)
 *
 * Every method borrows one connection through ConnectionProvider.withConnection,
 * runs parametrized SQL ($1..$n) against `music_data`, and gives the
 * connection back before returning. Rows are parsed by a zod schema into Song,
 * so a column the driver hands back as a string (NUMERIC, COUNT) arrives as a
 * number and an unexpected shape surfaces as QueryError instead of bad data.
 *
 * Failures from the pool and the connection wrapper are caught here and
 * returned as Result errors. A ConnectionLostError gets exactly one retry on a
 * fresh connection (the broken one is discarded by the pool on release).
 *
 * Titles are compared with LOWER() on both sides, matching the expression
 * index from migration 002; substring search goes through ILIKE with the
 * term's own % and _ escaped.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { RatedSong, RatingTarget, Song } from '@domain/entities/Song';
import type { ISongRepository, RatingUpdateError } from '@domain/interfaces/ISongRepository';
import type { ConnectionProvider } from '@infrastructure/database/ConnectionPool';
import type { QueryExecutor } from '@infrastructure/database/DatabaseConnection';
import { SONGS_TABLE } from '@shared/constants';
import {
  AmbiguousTargetError,
  ConnectionLostError,
  DatabaseError,
  NotFoundError,
  QueryError,
} from '@shared/errors/AppError';
import { fail, ok, type Result } from '@shared/result';
import type { RecordPage } from '@shared/types';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod/v4';

const SONG_COLUMNS = [
  'id',
  'title',
  'danceability',
  'energy',
  'mode',
  'acousticness',
  'tempo',
  'duration_ms',
  'num_sections',
  'num_segments',
  'star_rating',
  'created_at',
  'updated_at',
].join(', ');

const TITLE_MATCH = "title ILIKE $1 ESCAPE E'\\\\'";

const nullableNumber = z.coerce.number().nullable();
const nullableDate = z.coerce.date().nullable();

const songRowSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    danceability: nullableNumber,
    energy: nullableNumber,
    mode: nullableNumber,
    acousticness: nullableNumber,
    tempo: nullableNumber,
    duration_ms: nullableNumber,
    num_sections: nullableNumber,
    num_segments: nullableNumber,
    star_rating: nullableNumber,
    created_at: nullableDate,
    updated_at: nullableDate,
  })
  .transform(
    (row): Song => ({
      id: row.id,
      title: row.title,
      danceability: row.danceability,
      energy: row.energy,
      mode: row.mode,
      acousticness: row.acousticness,
      tempo: row.tempo,
      durationMs: row.duration_ms,
      numSections: row.num_sections,
      numSegments: row.num_segments,
      starRating: row.star_rating,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    }),
  );

const ratedRowSchema = z
  .object({ id: z.string(), title: z.string(), star_rating: z.coerce.number() })
  .transform((row): RatedSong => ({ id: row.id, title: row.title, starRating: row.star_rating }));

const idRowSchema = z.object({ id: z.string() });

const countRowSchema = z.object({ total: z.coerce.number().int().min(0) });

type TargetError = NotFoundError | AmbiguousTargetError;

@injectable()
export class PostgresSongRepository implements ISongRepository {
  constructor(
    @inject(TOKENS.ConnectionPool) private readonly pool: ConnectionProvider,
    @inject(TOKENS.Logger) private readonly log: Logger,
  ) {}

  async findExact(title: string): Promise<Result<Song | null, DatabaseError>> {
    return this.run('findExact', async (conn) => {
      const { rows } = await conn.execute(
        `SELECT ${SONG_COLUMNS} FROM ${SONGS_TABLE}
         WHERE LOWER(title) = LOWER($1)
         ORDER BY id ASC
         LIMIT 1`,
        [title],
      );
      const [row] = rows;
      return row ? songRowSchema.parse(row) : null;
    });
  }

  async search(
    term: string,
    offset: number,
    limit: number,
  ): Promise<Result<RecordPage<Song>, DatabaseError>> {
    const pattern = `%${escapeLike(term)}%`;

    return this.run('search', async (conn) => {
      const total = await this.count(conn, `WHERE ${TITLE_MATCH}`, [pattern]);
      if (total === 0 || offset >= total) return { rows: [], total };

      // Exact (case-insensitive) titles first, then alphabetical; id breaks ties so pages never overlap.
      const { rows } = await conn.execute(
        `SELECT ${SONG_COLUMNS} FROM ${SONGS_TABLE}
         WHERE ${TITLE_MATCH}
         ORDER BY (LOWER(title) = LOWER($2)) DESC, title ASC, id ASC
         LIMIT $3 OFFSET $4`,
        [pattern, term, limit, offset],
      );
      return { rows: rows.map((row) => songRowSchema.parse(row)), total };
    });
  }

  async listAll(offset: number, limit: number): Promise<Result<RecordPage<Song>, DatabaseError>> {
    return this.run('listAll', async (conn) => {
      const total = await this.count(conn, '', []);
      if (total === 0 || offset >= total) return { rows: [], total };

      const { rows } = await conn.execute(
        `SELECT ${SONG_COLUMNS} FROM ${SONGS_TABLE}
         ORDER BY title ASC, id ASC
         LIMIT $1 OFFSET $2`,
        [limit, offset],
      );
      return { rows: rows.map((row) => songRowSchema.parse(row)), total };
    });
  }

  /**
   * A title target is resolved first (LIMIT 2 is enough to tell "one" from
   * "several"); only a unique match reaches the UPDATE. An id target goes
   * straight to the UPDATE, where zero affected rows means NotFound.
   */
  async updateRating(
    target: RatingTarget,
    rating: number,
  ): Promise<Result<RatedSong, RatingUpdateError>> {
    const outcome = await this.run(
      'updateRating',
      async (conn): Promise<Result<RatedSong, TargetError>> => {
        const resolved = await this.resolveTarget(conn, target);
        if (!resolved.ok) return resolved;

        const { rows } = await conn.execute(
          `UPDATE ${SONGS_TABLE}
           SET star_rating = $1, updated_at = NOW()
           WHERE id = $2
           RETURNING id, title, star_rating`,
          [rating, resolved.value],
        );
        const [row] = rows;
        if (!row) return fail(new NotFoundError('Song', describeTarget(target)));

        const rated = ratedRowSchema.parse(row);
        this.log.info({ id: rated.id, rating: rated.starRating }, 'Song rating updated');
        return ok(rated);
      },
    );

    if (!outcome.ok) return outcome;
    return outcome.value;
  }

  private async resolveTarget(
    conn: QueryExecutor,
    target: RatingTarget,
  ): Promise<Result<string, TargetError>> {
    if ('id' in target) return ok(target.id);

    const { rows } = await conn.execute(
      `SELECT id FROM ${SONGS_TABLE}
       WHERE LOWER(title) = LOWER($1)
       ORDER BY id ASC
       LIMIT 2`,
      [target.title],
    );
    if (rows.length === 0) return fail(new NotFoundError('Song', target.title));
    if (rows.length > 1) return fail(new AmbiguousTargetError('Song', target.title));
    return ok(idRowSchema.parse(rows[0]).id);
  }

  private async count(
    conn: QueryExecutor,
    where: string,
    params: readonly string[],
  ): Promise<number> {
    const { rows } = await conn.execute(
      `SELECT COUNT(*) AS total FROM ${SONGS_TABLE} ${where}`.trimEnd(),
      params,
    );
    return countRowSchema.parse(rows[0]).total;
  }

  /** Run `work` on a pooled connection; one retry when the connection dropped. */
  private async run<T>(
    operation: string,
    work: (conn: QueryExecutor) => Promise<T>,
  ): Promise<Result<T, DatabaseError>> {
    const first = await this.attempt(work);
    if (first.ok || !(first.error instanceof ConnectionLostError)) return first;

    this.log.warn(
      { operation, err: first.error },
      'Connection lost mid-query, retrying once on a fresh connection',
    );
    return this.attempt(work);
  }

  private async attempt<T>(
    work: (conn: QueryExecutor) => Promise<T>,
  ): Promise<Result<T, DatabaseError>> {
    try {
      return ok(await this.pool.withConnection(work));
    } catch (err) {
      if (err instanceof DatabaseError) return fail(err);
      if (err instanceof z.ZodError) {
        const detail = z.prettifyError(err);
        return fail(new QueryError(`Unexpected row shape from ${SONGS_TABLE}: ${detail}`, undefined, err));
      }
      throw err;
    }
  }
}

/** Escape LIKE metacharacters so user input only ever matches literally. */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function describeTarget(target: RatingTarget): string {
  return 'id' in target ? target.id : target.title;
}
