/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Response shapes the service builds and the controller serializes. Keys are
 * snake_case because they are the public JSON contract; the domain entity
 * (Song) stays camelCase. PageWindow is what the service hands the DAO after
 * validating ?page and ?limit.
 */

/** Validated pagination request: `limit` is already clamped. */
export interface PageWindow {
  page: number;
  limit: number;
  offset: number;
}

/** A page of DAO records plus the size of the full match set. */
export interface RecordPage<T> {
  rows: T[];
  total: number;
}

export interface PaginationMeta {
  current_page: number;
  per_page: number;
  total_results: number;
  total_pages: number;
  has_next: boolean;
  has_prev: boolean;
  next_page: number | null;
  prev_page: number | null;
}

/** Full record returned for an exact title match. */
export interface SongDetail {
  id: string;
  title: string;
  danceability: number | null;
  energy: number | null;
  mode: number | null;
  acousticness: number | null;
  tempo: number | null;
  duration_ms: number | null;
  num_sections: number | null;
  num_segments: number | null;
  star_rating: number | null;
  is_rated: boolean;
  duration_minutes: number | null;
  created_at: string | null;
  updated_at: string | null;
}

/** Compact record used in search and catalogue pages. */
export interface SongSummary {
  id: string;
  title: string;
  star_rating: number | null;
  danceability: number | null;
  energy: number | null;
  mode: number | null;
  acousticness: number | null;
  tempo: number | null;
  duration_ms: number | null;
  is_rated: boolean;
}

export interface SongSearchPage {
  songs: SongSummary[];
  search_term: string;
  pagination: PaginationMeta;
}

export interface SongCatalogPage {
  songs: SongSummary[];
  pagination: PaginationMeta;
}

/** getSong() answers with either the exact match or a page of candidates. */
export type SongLookup =
  | { match: 'exact'; song: SongDetail }
  | { match: 'search'; results: SongSearchPage };

export interface RatingConfirmation {
  id: string;
  title: string;
  rating: number;
  message: string;
}

export interface IngestionResult {
  totalRead: number;
  totalInserted: number;
  totalSkipped: number;
  totalInvalid: number;
  durationMs: number;
}
