/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling and a factory
 * function for creating configured axios instances. This keeps connection
 * pooling, timeouts, request logging and retry behavior consistent across
 * every outgoing request.
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults, type AxiosError } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';
import {
  DEFAULT_RETRY_CONFIG,
  calculateBackoffDelay,
  isRetryableError,
  parseRetryAfter,
  type RetryConfig,
} from '../utils/retry.js';

declare module 'axios' {
  interface AxiosRequestConfig {
    /** Timing metadata set by the request interceptor */
    metadata?: { startTime: number };
    /** Retries already spent on this request */
    retryCount?: number;
  }
}

// Default per-request timeout; callers pass their own via `timeout`
const DEFAULT_TIMEOUT_MS = 30000;

// Shared across all HTTP clients to maximize connection reuse
const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 50,
  maxFreeSockets: 10,
  timeout: 60000,
});

export interface HttpClientOptions {
  /** Retry policy for transient failures; maxAttempts 0 disables retries */
  retry?: Partial<RetryConfig>;
  /** Name used in log lines, e.g. the upstream service */
  serviceName?: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create a configured axios instance with connection pooling, request logging and retries
 *
 * @param config - Axios defaults merged over ours
 */
export function createHttpClient(config?: CreateAxiosDefaults, options: HttpClientOptions = {}): AxiosInstance {
  const retryConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
  const service = options.serviceName ?? 'http';

  const client = axios.create({
    timeout: DEFAULT_TIMEOUT_MS,
    httpAgent,
    httpsAgent,
    ...config,
  });

  client.interceptors.request.use((requestConfig) => {
    requestConfig.metadata = { startTime: Date.now() };
    logger.debug(
      {
        service,
        method: requestConfig.method?.toUpperCase(),
        url: requestConfig.url,
        params: requestConfig.params,
        timeout: requestConfig.timeout,
      },
      'Outgoing HTTP request'
    );
    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      const startTime = response.config.metadata?.startTime;
      logger.debug(
        {
          service,
          method: response.config.method?.toUpperCase(),
          url: response.config.url,
          status: response.status,
          duration: startTime !== undefined ? Date.now() - startTime : undefined,
        },
        'HTTP response received'
      );
      return response;
    },
    async (error: AxiosError) => {
      const requestConfig = error.config;
      const startTime = requestConfig?.metadata?.startTime;

      logger.debug(
        {
          service,
          method: requestConfig?.method?.toUpperCase(),
          url: requestConfig?.url,
          status: error.response?.status,
          code: error.code,
          duration: startTime !== undefined ? Date.now() - startTime : undefined,
        },
        'HTTP request failed'
      );

      if (!requestConfig || !isRetryableError(error)) {
        return Promise.reject(error);
      }

      const attempt = (requestConfig.retryCount ?? 0) + 1;
      if (attempt > retryConfig.maxAttempts) {
        return Promise.reject(error);
      }
      requestConfig.retryCount = attempt;

      let delay = calculateBackoffDelay(attempt, retryConfig);
      if (error.response?.status === 429) {
        const retryAfter = parseRetryAfter(error.response.headers['retry-after']);
        if (retryAfter !== undefined) {
          delay = Math.min(retryAfter, retryConfig.maxDelay);
        }
      }

      logger.warn(
        {
          service,
          attempt,
          maxRetries: retryConfig.maxAttempts,
          delay,
          url: requestConfig.url,
          method: requestConfig.method,
          status: error.response?.status,
        },
        'HTTP request failed, retrying...'
      );

      await sleep(delay);
      return client.request(requestConfig);
    }
  );

  return client;
}

/**
 * Close HTTP agents and free up connections
 * Called during graceful shutdown
 */
export function closeHttpAgents(): void {
  httpAgent.destroy();
  httpsAgent.destroy();
  logger.debug('HTTP agents destroyed');
}
