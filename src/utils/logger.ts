/**
 * Logging configuration using Pino.
 */

import { pino, type LoggerOptions, type Logger as PinoLogger } from 'pino';
import { LogLevelSchema } from '../config.js';

const env = process.env.NODE_ENV;

/**
 * Shared by the global logger and the Fastify server.
 * Silent under tests; pretty-printed outside production.
 */
export const loggerOptions: LoggerOptions = {
  level:
    env === 'test'
      ? 'silent'
      : LogLevelSchema.catch('INFO').parse(process.env.LOG_LEVEL).toLowerCase(),
  transport:
    env !== 'production' && env !== 'test'
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

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino(loggerOptions);

export type Logger = PinoLogger;
