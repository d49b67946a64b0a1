/**
 * Migration 001 — Create the `music_data` Table
 * Layer: Infrastructure (Database)
 *
 * One row per track. `id` is the catalogue's own opaque identifier (not a
 * serial), `title` is deliberately not unique, and the audio features are
 * written once by the seed script. `star_rating` is the only column the API
 * mutates; NUMERIC(2,1) holds 0.0–5.0 and the CHECK constraint backs up the
 * service-side validation.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('music_data', (table) => {
    table.string('id', 255).primary();
    table.string('title', 255).notNullable();
    table.double('danceability');
    table.double('energy');
    table.integer('mode');
    table.double('acousticness');
    table.double('tempo');
    table.integer('duration_ms');
    table.integer('num_sections');
    table.integer('num_segments');
    table.decimal('star_rating', 2, 1).nullable();

    table.timestamps(true, true);

    table.index('title', 'idx_music_data_title');
  });

  await knex.raw(`
    ALTER TABLE music_data
    ADD CONSTRAINT chk_music_data_star_rating
    CHECK (star_rating IS NULL OR (star_rating >= 0 AND star_rating <= 5))
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('music_data');
}
