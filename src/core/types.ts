/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is registered in the tsyringe container under
 * one of these symbols. Symbol.for keeps them unique without colliding with
 * plain strings and keeps them out of JSON.stringify output.
 *
 * Grouped by layer: add the token here before registering a new repository
 * or service in container.ts.
 */
export const TOKENS = {
  // Infrastructure
  Logger: Symbol.for('Logger'),
  ConnectionPool: Symbol.for('ConnectionPool'),

  // Repositories
  SongRepository: Symbol.for('SongRepository'),

  // Services
  SongService: Symbol.for('SongService'),
} as const;
