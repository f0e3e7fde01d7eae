/**
 * CORS Configuration
 *
 * Without ALLOWED_ORIGINS every origin is accepted; with it, only the listed ones.
 */
import type { CorsOptions } from 'cors';
import { logger } from '../utils/logger.js';
import type { Env } from './env.js';

/**
 * Split a comma-separated origin list, dropping blanks
 */
export function parseAllowedOrigins(value: string | undefined): string[] {
  if (!value || !value.trim()) {
    return [];
  }
  return value.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0);
}

/**
 * Check if an origin is allowed
 */
export function isOriginAllowed(origin: string | undefined, allowedOrigins: string[]): boolean {
  // Requests without an Origin header (curl, server-to-server) are not CORS requests
  if (!origin || allowedOrigins.length === 0) {
    return true;
  }
  return allowedOrigins.includes(origin);
}

/**
 * Get CORS configuration options
 */
export function getCorsOptions(env: Env): CorsOptions {
  const allowedOrigins = parseAllowedOrigins(env.ALLOWED_ORIGINS);

  logger.info(
    { allowedOrigins: allowedOrigins.length > 0 ? allowedOrigins : '*' },
    'CORS: Configured allowed origins'
  );

  return {
    origin: (origin, callback) => {
      if (isOriginAllowed(origin, allowedOrigins)) {
        callback(null, true);
        return;
      }

      if (env.NODE_ENV === 'development') {
        logger.warn({ origin, allowedOrigins }, 'CORS: Origin not allowed');
      }
      callback(null, false);
    },
    optionsSuccessStatus: 200,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['X-Request-ID', 'Retry-After'],
  };
}
