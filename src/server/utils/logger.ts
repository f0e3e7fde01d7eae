// .env must be applied before the level and transport are chosen
import '../config/loadDotenv.js';
import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for request context (request ID, method, path)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current request context
 */
export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseLogLevel(value: string | undefined, fallback: LevelWithSilent): LevelWithSilent {
  return LOG_LEVELS.find((level) => level === value?.toLowerCase()) ?? fallback;
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  const logLevel = parseLogLevel(process.env.LOG_LEVEL, isDevelopment ? 'debug' : 'info');

  return pino({
    level: logLevel,
    base: {
      env: nodeEnv,
      service: 'notion-page-service',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    redact: ['headers.Authorization', 'headers.authorization'],
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
 * Create a child logger carrying the current request context plus additional fields
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getRequestContext(), ...additionalContext };
  return logger.child(context);
}
