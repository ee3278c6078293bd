/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production, which is what the cluster's log
 * collector expects to scrape from stdout. In development the stream goes
 * through `pino-pretty` for colours and readable timestamps.
 *
 * The exported `Logger` type lets services declare a logger dependency without
 * importing Pino, so tests can hand them a stub.
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
