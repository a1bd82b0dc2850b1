import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { config, isDevelopment, isTest } from '../config/app.js';

export type { Logger } from 'pino';

/** Shared by the process logger and Fastify's request logger. Silent under vitest. */
export const loggerOptions: LoggerOptions = {
  name: config.PROJECT_NAME,
  level: isTest ? 'silent' : config.LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname'
        }
      }
    : undefined
};

export const logger: Logger = pino(loggerOptions);

export function componentLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ component, ...bindings });
}
