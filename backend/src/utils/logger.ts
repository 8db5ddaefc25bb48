/**
 * Centralized logging utility using Pino
 */

import pino from 'pino';

/**
 * Root logger. Pretty-printed in development, JSON everywhere else.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'goat-debate' },
  transport: process.env.NODE_ENV === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

/**
 * Create a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

/**
 * Child logger bound to one debate session
 */
export function createSessionLogger(sessionId: string) {
  return logger.child({ sessionId, context: 'debate' });
}
