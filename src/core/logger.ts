/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; in development the stream goes
 * through pino-pretty for colours and readable timestamps. Classes receive the
 * logger through DI (TOKENS.Logger) and depend on the exported `Logger` type,
 * so tests can hand them a silent child instead.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  base: { service: 'music-rating-api' },
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
