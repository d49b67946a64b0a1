/**
 * Seed CLI Script — Standalone Song Ingestion
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run seed -- [--file data/songs.json] [--migrate]
 *
 * Reads a JSON song dump (record list or column-oriented object), optionally
 * runs the Knex migrations first, and bulk-inserts the songs through
 * IngestionService. Safe to re-run: existing ids are skipped, so ratings
 * already given survive a reseed.
 */
import 'dotenv/config';
import 'reflect-metadata';

import { IngestionService } from '@application/services/IngestionService';
import { config } from '@core/config';
import { logger } from '@core/logger';
import { JsonSongAdapter, toRecords } from '@workers/ingest/JsonSongAdapter';
import { SongBatchWriter } from '@workers/ingest/SongBatchWriter';
import fs from 'node:fs/promises';
import path from 'node:path';
import knex from 'knex';

import knexConfig from '../../knexfile';

// CLI argument parsing

const args = process.argv.slice(2);

function getArg(flag: string, fallback: string): string {
  const idx = args.indexOf(flag);
  const value = idx !== -1 ? args[idx + 1] : undefined;
  return value ?? fallback;
}

const hasFlag = (flag: string): boolean => args.includes(flag);

const defaultFile = path.resolve(config.ingest.dataDir, 'songs.json');
const filePath = path.resolve(getArg('--file', defaultFile));
const runMigrations = hasFlag('--migrate');

// Helpers

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString();
}

async function readSongFile(file: string): Promise<unknown[]> {
  const text = await fs.readFile(file, 'utf-8');
  const data: unknown = JSON.parse(text);
  return toRecords(data);
}

// Main

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;

  log('');
  log('  Music Rating API — Song Seed');
  log('');
  log(`  File:       ${filePath}`);
  log(`  Batch size: ${formatNumber(config.ingest.batchSize)}`);
  log(`  Database:   ${config.database.host}:${config.database.port}/${config.database.name}`);
  log('');

  const records = await readSongFile(filePath);
  log(`  Read ${formatNumber(records.length)} records`);

  const db = knex(knexConfig[config.nodeEnv] ?? knexConfig.development);
  try {
    if (runMigrations) {
      log('  Running migrations...');
      await db.migrate.latest();
      log('  Migrations complete.');
      log('');
    }

    const writer = new SongBatchWriter(db, { batchSize: config.ingest.batchSize });
    const service = new IngestionService(
      new JsonSongAdapter(),
      writer,
      logger.child({ component: 'seed' }),
    );

    const result = await service.ingest(records, (processed) => {
      log(`  ${formatNumber(processed)} records processed`);
    });

    log('');
    log('  ✓ Ingestion complete');
    log(`    Read:      ${formatNumber(result.totalRead)}`);
    log(`    Inserted:  ${formatNumber(result.totalInserted)}`);
    log(`    Skipped:   ${formatNumber(result.totalSkipped)} (id already present)`);
    log(`    Invalid:   ${formatNumber(result.totalInvalid)}`);
    log(`    Duration:  ${formatDuration(result.durationMs)}`);
    log('');
  } finally {
    await db.destroy();
  }
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Seed failed:', err);
  process.exit(1);
});
