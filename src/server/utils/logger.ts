import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for request context (request ID, upload name, etc.)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current request context
 */
export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

function resolveLevel(isDevelopment: boolean, isTest: boolean): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (isTest) {
    return 'silent';
  }
  return isDevelopment ? 'debug' : 'info';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isTest = nodeEnv === 'test';
  const isDevelopment = nodeEnv === 'development';
  const usePretty = isDevelopment && process.env.LOG_PRETTY !== 'false';

  return pino({
    level: resolveLevel(isDevelopment, isTest),
    base: {
      env: nodeEnv,
      service: 'procurement-intake-api',
    },
    redact: ['apiKey', '*.apiKey', 'authorization', '*.authorization'],
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(usePretty && {
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
 * Create a child logger with the current request context plus additional fields
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getRequestContext(), ...additionalContext };
  return logger.child(context);
}
