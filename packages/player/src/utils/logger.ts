/**
 * Structured Logger Utility
 * Uses Pino for structured logging; each module logs through a child
 */

import pino from 'pino';

export type Logger = pino.Logger;

/**
 * Root logger. Level comes from LOG_LEVEL
 */
export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { name: 'turntable' },
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Plain JSON in production and tests
  ...(process.env.NODE_ENV === 'production' || process.env.NODE_ENV === 'test'
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
          },
        },
      }),
});

/**
 * Create a child logger for a module
 */
export function createLogger(module: string, context?: Record<string, unknown>): Logger {
  return logger.child({ module, ...context });
}
