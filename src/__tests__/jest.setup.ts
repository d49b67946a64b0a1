/**
 * Jest Global Setup
 *
 * Runs before every test file, ahead of any module import:
 *
 *   - `reflect-metadata` must be loaded before a tsyringe-decorated class is
 *     defined (server.ts gets it through container.ts).
 *   - LOG_LEVEL defaults to silent so expected 4xx/5xx paths don't flood the
 *     test output; set LOG_LEVEL=debug to see them.
 */
import 'reflect-metadata';

process.env.LOG_LEVEL ??= 'silent';
