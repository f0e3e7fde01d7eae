/**
 * Retry helpers for transient HTTP failures
 *
 * Shared by the HTTP client's retry interceptor: decides which failures are worth
 * another attempt and how long to wait before it.
 */

import axios from 'axios';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxAttempts: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
};

const RETRYABLE_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ECONNABORTED', 'EAI_AGAIN']);

/**
 * Retries on rate limiting (429), server errors (5xx) and network failures without a response
 */
export function isRetryableError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }

  const status = error.response?.status;
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  // Client aborted the request (e.g. caller cancelled): not ours to retry
  if (error.code === 'ERR_CANCELED') {
    return false;
  }

  return error.code === undefined || RETRYABLE_NETWORK_CODES.has(error.code) || error.code === 'ERR_NETWORK';
}

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Retry number, starting at 1
 */
export function calculateBackoffDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const delay = config.initialDelay * Math.pow(config.multiplier, attempt - 1);
  return Math.min(delay, config.maxDelay);
}

/**
 * Parse a Retry-After header given in seconds
 *
 * @returns delay in milliseconds, or undefined when absent or not a positive number
 */
export function parseRetryAfter(value: unknown): number | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    return undefined;
  }
  const seconds = typeof raw === 'number' ? raw : parseInt(raw, 10);
  if (isNaN(seconds) || seconds <= 0) {
    return undefined;
  }
  return seconds * 1000;
}
