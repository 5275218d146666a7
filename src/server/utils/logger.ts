import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * Fields attached to every logger created inside `runWithContext`, such as the source being scraped
 */
const logContext = new AsyncLocalStorage<Record<string, unknown>>();

function getLogContext(): Record<string, unknown> {
  return logContext.getStore() || {};
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const isDevelopment = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
  const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');
  return pino({
    level: logLevel,
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'arch-scraper',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getLogContext(), ...additionalContext };
  return logger.child(context);
}

/**
 * Run `fn` with `context` attached to every logger created inside it
 */
export function runWithContext<T>(context: Record<string, unknown>, fn: () => T): T {
  return logContext.run({ ...getLogContext(), ...context }, fn);
}
