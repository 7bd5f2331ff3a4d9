/**
 * Logger
 * 
 * Pino-based structured logger shared by every package.
 */

import pino from 'pino';

/**
 * Level to start with; unknown names fall back to info until the
 * validated configuration is applied
 */
export function resolveLogLevel(level: string | undefined): string {
  if (level === undefined) return 'info';
  return level === 'silent' || level in pino.levels.values ? level : 'info';
}

const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export const logger = pino({
  level: resolveLogLevel(process.env['LOG_LEVEL']),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'dropsort',
    env: NODE_ENV,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,service,env',
    },
  } : undefined,
});

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
