/**
 * Migration 002 — Title Lookup Indexes
 * Layer: Infrastructure (Database)
 *
 * Both title lookups are case-insensitive:
 *
 *   exact:   LOWER(title) = LOWER($1)     → B-tree expression index
 *   search:  title ILIKE '%term%'         → GIN trigram index (pg_trgm)
 *
 * A plain index on `title` serves neither, because of LOWER() and the
 * leading wildcard. pg_trgm splits strings into 3-character chunks, which
 * lets the GIN index answer substring ILIKE without a sequential scan.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.raw('CREATE EXTENSION IF NOT EXISTS pg_trgm');

  await knex.raw(`
    CREATE INDEX idx_music_data_title_lower
    ON music_data (LOWER(title))
  `);

  await knex.raw(`
    CREATE INDEX idx_music_data_title_trgm
    ON music_data USING GIN (title gin_trgm_ops)
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.raw('DROP INDEX IF EXISTS idx_music_data_title_trgm');
  await knex.raw('DROP INDEX IF EXISTS idx_music_data_title_lower');
}
