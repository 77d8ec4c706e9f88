/**
 * Logger
 * 
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the monorepo.
 */

import { pino } from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.logLevel,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'aligner',
    env: config.nodeEnv,
  },
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
    },
  } : undefined,
});

export type Logger = typeof logger;

/**
 * Create a child logger bound to a module name, plus any extra context
 */
export function createLogger(
  module: string,
  context: Record<string, unknown> = {}
): Logger {
  return logger.child({ module, ...context });
}
