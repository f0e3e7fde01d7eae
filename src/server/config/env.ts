/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables. Values are validated once
 * and cached; invalid configuration fails fast at startup with every problem listed.
 */

import './loadDotenv.js';
import { logger } from '../utils/logger.js';

/**
 * Placeholder the setup guides ship in .env templates; treated as "not configured"
 */
export const NOTION_API_KEY_PLACEHOLDER = 'changethis';

function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

export type NodeEnv = 'development' | 'production' | 'test';

function isNodeEnv(value: string): value is NodeEnv {
  return value === 'development' || value === 'production' || value === 'test';
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: NodeEnv;
  PORT: number;

  // Notion API Configuration
  NOTION_API_KEY?: string;
  NOTION_API_BASE_URL: string;
  NOTION_API_VERSION: string;
  NOTION_TIMEOUT_MS: number;
  NOTION_MAX_RETRIES: number;
  NOTION_INGEST_CONCURRENCY: number;

  // CORS Configuration
  ALLOWED_ORIGINS?: string;

  // Logging Configuration
  LOG_LEVEL?: string;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {Error} If any variable holds an invalid value
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const port = parseNumericEnv(process.env.PORT, 8000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${process.env.PORT}". Must be between 1 and 65535.`);
  }

  const baseUrl = process.env.NOTION_API_BASE_URL || 'https://api.notion.com/v1';
  try {
    new URL(baseUrl);
  } catch {
    errors.push(`NOTION_API_BASE_URL: Invalid value "${baseUrl}". Must be an absolute URL.`);
  }

  const timeoutMs = parseNumericEnv(process.env.NOTION_TIMEOUT_MS, 30000);
  if (timeoutMs < 1) {
    errors.push(`NOTION_TIMEOUT_MS: Invalid value "${process.env.NOTION_TIMEOUT_MS}". Must be at least 1.`);
  }

  const maxRetries = parseNumericEnv(process.env.NOTION_MAX_RETRIES, 3);
  if (maxRetries < 0) {
    errors.push(`NOTION_MAX_RETRIES: Invalid value "${process.env.NOTION_MAX_RETRIES}". Must be 0 or more.`);
  }

  const ingestConcurrency = parseNumericEnv(process.env.NOTION_INGEST_CONCURRENCY, 3);
  if (ingestConcurrency < 1) {
    errors.push(`NOTION_INGEST_CONCURRENCY: Invalid value "${process.env.NOTION_INGEST_CONCURRENCY}". Must be at least 1.`);
  }
  if (ingestConcurrency > 10) {
    // Notion allows an average of three requests per second per integration
    logger.warn(`NOTION_INGEST_CONCURRENCY (${ingestConcurrency}) is greater than 10. Expect rate limiting from the Notion API.`);
  }

  const apiKey = process.env.NOTION_API_KEY;
  if (nodeEnv === 'production' && (!apiKey || apiKey === NOTION_API_KEY_PLACEHOLDER)) {
    errors.push('NOTION_API_KEY: Environment variable is required in production.');
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    PORT: port,

    NOTION_API_KEY: apiKey,
    NOTION_API_BASE_URL: baseUrl.replace(/\/+$/, ''),
    NOTION_API_VERSION: process.env.NOTION_API_VERSION || '2022-06-28',
    NOTION_TIMEOUT_MS: timeoutMs,
    NOTION_MAX_RETRIES: maxRetries,
    NOTION_INGEST_CONCURRENCY: ingestConcurrency,

    ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS,

    LOG_LEVEL: process.env.LOG_LEVEL,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}

/**
 * Whether a usable Notion integration token is configured
 */
export function isNotionConfigured(env: Env = getEnv()): boolean {
  return Boolean(env.NOTION_API_KEY) && env.NOTION_API_KEY !== NOTION_API_KEY_PLACEHOLDER;
}
