/**
 * Logging configuration using Pino.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import type { Config } from '../config.js';

/**
 * Pino options for a configured log level. Fastify takes the same object
 * for its request logger.
 */
export function loggerOptions(level: Config['LOG_LEVEL']): LoggerOptions {
  return {
    level: level.toLowerCase(),
    transport:
      process.env.NODE_ENV !== 'production'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  };
}

/**
 * Logger instance for services outside the request cycle.
 */
export function createLogger(level: Config['LOG_LEVEL']): Logger {
  return pino(loggerOptions(level));
}

/**
 * Logger that drops everything; used where a caller has nothing to log to.
 */
export const silentLogger: Logger = pino({ level: 'silent' });
