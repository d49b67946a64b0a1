/**
 * Song Repository Interface — The Data Access Contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * WHAT the service needs from storage, not HOW. PostgresSongRepository is the
 * production implementation; tests use a jest.fn() double or an in-memory
 * catalogue behind the same contract.
 *
 * Every method resolves to a Result. Pool, connection and SQL failures arrive
 * as DatabaseError values; the promise only rejects on programmer errors.
 */
import type { RatedSong, RatingTarget, Song } from '@domain/entities/Song';
import type { AmbiguousTargetError, DatabaseError, NotFoundError } from '@shared/errors/AppError';
import type { Result } from '@shared/result';
import type { RecordPage } from '@shared/types';

export type RatingUpdateError = NotFoundError | AmbiguousTargetError | DatabaseError;

export interface ISongRepository {
  /** Case-insensitive title equality; lowest id wins when several songs share the title. */
  findExact(title: string): Promise<Result<Song | null, DatabaseError>>;

  /** Case-insensitive substring match. `total` counts the whole match set, not the page. */
  search(term: string, offset: number, limit: number): Promise<Result<RecordPage<Song>, DatabaseError>>;

  /** Set star_rating on exactly one song; zero or several matches leave the table untouched. */
  updateRating(target: RatingTarget, rating: number): Promise<Result<RatedSong, RatingUpdateError>>;

  /** The whole catalogue, ordered by title then id. */
  listAll(offset: number, limit: number): Promise<Result<RecordPage<Song>, DatabaseError>>;
}
