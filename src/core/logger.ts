/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; piped through `pino-pretty` in
 * development for colours and readable timestamps.
 *
 * The exported `Logger` type lets other modules declare "I need a logger"
 * without coupling to Pino directly, so tests can hand in a stub.
 */
import pino from 'pino';

import { config } from './config';

export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
