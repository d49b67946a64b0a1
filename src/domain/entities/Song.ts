/**
 * Song Entity — The Core Data Model
 * Layer: Domain
 *
 * Two shapes for the same concept:
 *
 *   Song     — camelCase, what services and controllers work with.
 *   SongRow  — snake_case, the columns the ingestion script writes into
 *              `music_data`.
 *
 * The mapping from database rows to Song happens in one place: the row schema
 * in PostgresSongRepository.
 *
 * Audio features are written once at ingestion and never change; the API's
 * only mutation is `starRating` (null = unrated, otherwise 0–5).
 */
export interface Song {
  id: string;
  title: string;
  danceability: number | null;
  energy: number | null;
  mode: number | null;
  acousticness: number | null;
  tempo: number | null;
  durationMs: number | null;
  numSections: number | null;
  numSegments: number | null;
  starRating: number | null;
  createdAt: Date | null;
  updatedAt: Date | null;
}

export interface SongRow {
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
}

/** What a rating update hands back. */
export interface RatedSong {
  id: string;
  title: string;
  starRating: number;
}

/** A rating update addresses a song by its id or by an exact (case-insensitive) title. */
export type RatingTarget = { id: string } | { title: string };
