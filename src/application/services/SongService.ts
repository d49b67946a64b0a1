/**
 * Song Service — Lookup, Pagination & Rating Rules
 * Layer: Application
 *
 * Everything between "the controller has some strings" and "the repository
 * runs SQL":
 *
 *   - titles are trimmed and checked (non-empty, ≤ 255 chars, no NUL byte)
 *   - ?page / ?limit become a PageWindow (limit clamped to MAX_PAGE_SIZE)
 *   - ratings are range-checked and rounded to one decimal
 *   - Song entities become the snake_case response shapes
 *
 * getSong() tries an exact title match first and only falls back to a
 * paginated substring search when there is none. rateSong() never falls back:
 * a rating is written against exactly one song or not at all.
 *
 * Nothing here throws for expected failures; each method returns a Result and
 * the controller turns the error kind into a status code.
 */
import { TOKENS } from '@core/types';
import type { Song } from '@domain/entities/Song';
import type { ISongRepository, RatingUpdateError } from '@domain/interfaces/ISongRepository';
import {
  DEFAULT_PAGE_SIZE,
  DEFAULT_SEARCH_PAGE_SIZE,
  MAX_PAGE_SIZE,
  MAX_RATING,
  MAX_TITLE_LENGTH,
  MIN_RATING,
} from '@shared/constants';
import {
  type DatabaseError,
  InvalidParameterError,
  InvalidRatingError,
  NotFoundError,
} from '@shared/errors/AppError';
import { fail, ok, type Result } from '@shared/result';
import { characterCount } from '@shared/text';
import type {
  PageWindow,
  PaginationMeta,
  RatingConfirmation,
  SongCatalogPage,
  SongDetail,
  SongLookup,
  SongSummary,
} from '@shared/types';
import { inject, injectable } from 'tsyringe';

export type SongLookupError = InvalidParameterError | NotFoundError | DatabaseError;
export type RateSongError = InvalidParameterError | InvalidRatingError | RatingUpdateError;

@injectable()
export class SongService {
  constructor(@inject(TOKENS.SongRepository) private readonly repo: ISongRepository) {}

  async getSong(
    rawTitle: string,
    page = 1,
    limit = DEFAULT_SEARCH_PAGE_SIZE,
  ): Promise<Result<SongLookup, SongLookupError>> {
    const title = normalizeTitle(rawTitle);
    if (!title.ok) return title;
    const pageWindow = resolvePageWindow(page, limit);
    if (!pageWindow.ok) return pageWindow;

    const exact = await this.repo.findExact(title.value);
    if (!exact.ok) return exact;
    if (exact.value) return ok({ match: 'exact', song: toSongDetail(exact.value) });

    const { offset } = pageWindow.value;
    const found = await this.repo.search(title.value, offset, pageWindow.value.limit);
    if (!found.ok) return found;

    const { rows, total } = found.value;
    if (rows.length === 0) return fail(new NotFoundError('Song', title.value));

    return ok({
      match: 'search',
      results: {
        songs: rows.map(toSongSummary),
        search_term: title.value,
        pagination: buildPagination(pageWindow.value, total),
      },
    });
  }

  async rateSong(
    rawTitle: string,
    rating: number,
  ): Promise<Result<RatingConfirmation, RateSongError>> {
    const title = normalizeTitle(rawTitle);
    if (!title.ok) return title;
    const stars = validateRating(rating);
    if (!stars.ok) return stars;

    const updated = await this.repo.updateRating({ title: title.value }, stars.value);
    if (!updated.ok) return updated;

    const { id, title: storedTitle, starRating } = updated.value;
    return ok({
      id,
      title: storedTitle,
      rating: starRating,
      message: `Successfully updated rating to ${starRating} stars`,
    });
  }

  async listSongs(
    page = 1,
    limit = DEFAULT_PAGE_SIZE,
  ): Promise<Result<SongCatalogPage, SongLookupError>> {
    const pageWindow = resolvePageWindow(page, limit);
    if (!pageWindow.ok) return pageWindow;

    const listed = await this.repo.listAll(pageWindow.value.offset, pageWindow.value.limit);
    if (!listed.ok) return listed;

    const { rows, total } = listed.value;
    if (rows.length === 0) return fail(new NotFoundError('Page', String(pageWindow.value.page)));

    return ok({
      songs: rows.map(toSongSummary),
      pagination: buildPagination(pageWindow.value, total),
    });
  }
}

export function normalizeTitle(raw: string): Result<string, InvalidParameterError> {
  const title = raw.trim();
  if (title.length === 0) return fail(new InvalidParameterError('Song title is required'));
  if (characterCount(title) > MAX_TITLE_LENGTH) {
    return fail(
      new InvalidParameterError(`Song title must be at most ${MAX_TITLE_LENGTH} characters`),
    );
  }
  if (title.includes('\0')) {
    return fail(new InvalidParameterError('Song title contains invalid characters'));
  }
  return ok(title);
}

export function resolvePageWindow(
  page: number,
  limit: number,
): Result<PageWindow, InvalidParameterError> {
  if (!Number.isInteger(page) || page < 1) {
    return fail(new InvalidParameterError('Page must be a positive integer'));
  }
  if (!Number.isInteger(limit) || limit < 1) {
    return fail(new InvalidParameterError('Limit must be a positive integer'));
  }
  const clamped = Math.min(limit, MAX_PAGE_SIZE);
  return ok({ page, limit: clamped, offset: (page - 1) * clamped });
}

export function validateRating(rating: number): Result<number, InvalidRatingError> {
  if (!Number.isFinite(rating) || rating < MIN_RATING || rating > MAX_RATING) {
    return fail(new InvalidRatingError());
  }
  return ok(roundTo(rating, 1));
}

export function buildPagination({ page, limit }: PageWindow, total: number): PaginationMeta {
  const totalPages = Math.ceil(total / limit);
  const hasNext = page < totalPages;
  const hasPrev = page > 1;
  return {
    current_page: page,
    per_page: limit,
    total_results: total,
    total_pages: totalPages,
    has_next: hasNext,
    has_prev: hasPrev,
    next_page: hasNext ? page + 1 : null,
    prev_page: hasPrev ? page - 1 : null,
  };
}

export function toSongDetail(song: Song): SongDetail {
  return {
    id: song.id,
    title: song.title,
    danceability: roundOrNull(song.danceability, 3),
    energy: roundOrNull(song.energy, 3),
    mode: song.mode,
    acousticness: roundOrNull(song.acousticness, 3),
    tempo: roundOrNull(song.tempo, 3),
    duration_ms: song.durationMs,
    num_sections: song.numSections,
    num_segments: song.numSegments,
    star_rating: song.starRating,
    is_rated: song.starRating !== null,
    duration_minutes: song.durationMs === null ? null : roundTo(song.durationMs / 60_000, 2),
    created_at: song.createdAt?.toISOString() ?? null,
    updated_at: song.updatedAt?.toISOString() ?? null,
  };
}

export function toSongSummary(song: Song): SongSummary {
  return {
    id: song.id,
    title: song.title,
    star_rating: song.starRating,
    danceability: roundOrNull(song.danceability, 3),
    energy: roundOrNull(song.energy, 3),
    mode: song.mode,
    acousticness: roundOrNull(song.acousticness, 3),
    tempo: roundOrNull(song.tempo, 3),
    duration_ms: song.durationMs,
    is_rated: song.starRating !== null,
  };
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function roundOrNull(value: number | null, decimals: number): number | null {
  return value === null ? null : roundTo(value, decimals);
}
