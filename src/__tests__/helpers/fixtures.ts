/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Made-up songs with fixed dates so assertions stay deterministic. makeSong()
 * fills every column; pass overrides for the fields a test cares about.
 */
import type { Song } from '@domain/entities/Song';

export const sampleSong: Song = {
  id: 'song-0001',
  title: '3AM',
  danceability: 0.52341,
  energy: 0.6,
  mode: 1,
  acousticness: 0.12345,
  tempo: 120.4567,
  durationMs: 210_000,
  numSections: 8,
  numSegments: 600,
  starRating: null,
  createdAt: new Date('2024-01-15T10:00:00.000Z'),
  updatedAt: new Date('2024-01-15T10:00:00.000Z'),
};

export function makeSong(overrides: Partial<Song> = {}): Song {
  return { ...sampleSong, ...overrides };
}

/** `count` songs whose titles contain "Love" but none of which is titled exactly "Love". */
export function makeLoveSongs(count: number): Song[] {
  return Array.from({ length: count }, (_, i) => {
    const n = String(i + 1).padStart(2, '0');
    return makeSong({ id: `love-${n}`, title: `Love Song ${n}` });
  });
}

/** A `music_data` row as pg returns it: NUMERIC as string, timestamps as Date. */
export const sampleSongRow: Record<string, unknown> = {
  id: 'song-0001',
  title: '3AM',
  danceability: 0.52341,
  energy: 0.6,
  mode: 1,
  acousticness: 0.12345,
  tempo: 120.4567,
  duration_ms: 210_000,
  num_sections: 8,
  num_segments: 600,
  star_rating: '4.5',
  created_at: new Date('2024-01-15T10:00:00.000Z'),
  updated_at: new Date('2024-02-01T08:30:00.000Z'),
};
