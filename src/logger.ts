/**
 * Package logger
 * Components take an optional pino logger and fall back to this one
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

/**
 * Create a pino logger with the package defaults
 * Level comes from LOG_LEVEL unless the options set one
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'chat-step-dispatcher',
    level: process.env.LOG_LEVEL ?? 'info',
    ...options,
  });
}

export const logger = createLogger();
