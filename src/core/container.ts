/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The one place that maps tokens to implementations:
 *
 *   TOKENS.Logger          → the pino root logger            (useValue)
 *   TOKENS.ConnectionPool  → a ConnectionPool, not yet init() (useValue)
 *   TOKENS.SongRepository  → PostgresSongRepository          (useClass)
 *   TOKENS.SongService     → SongService                     (useClass)
 *
 * `reflect-metadata` has to load before any decorated class so tsyringe can
 * read constructor parameter metadata. The pool is registered as a value so
 * server.ts can resolve the same instance to init() it before listening and
 * shut it down on SIGTERM. Building it opens no sockets.
 *
 * Tests re-register SongRepository with a fake after importing this module;
 * the last registration wins on resolve().
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { logger } from './logger';
import { TOKENS } from './types';

import { SongService } from '@application/services/SongService';
import { createConnectionPool } from '@infrastructure/database/connection';
import { PostgresSongRepository } from '@infrastructure/repositories/PostgresSongRepository';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.ConnectionPool, { useValue: createConnectionPool() });
container.register(TOKENS.SongRepository, { useClass: PostgresSongRepository });
container.register(TOKENS.SongService, { useClass: SongService });

export { container };
