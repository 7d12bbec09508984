/**
 * Structured logger
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { env } from '../config/env.js';

function createLogger(): Logger {
  const isDevelopment = env.NODE_ENV === 'development';

  return pino({
    level: env.LOG_LEVEL,
    base: { service: 'paper-digest-pipeline' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
        },
      },
    }),
  });
}

export const logger = createLogger();

/**
 * Create a child logger bound to a run, stage or channel
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}

export type { Logger };
