/**
 * Centralized error type definitions
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Domain-specific error types
 */
export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string = 'Service temporarily unavailable', context?: Record<string, unknown>) {
    super(message, ErrorCode.SERVICE_UNAVAILABLE, 503, true, context);
  }
}

/**
 * The page reference is not an http(s) URL, or its path holds no 32-hex page ID.
 * Always a client-input problem; never retried.
 */
export class ExtractionError extends AppError {
  public readonly input: string;

  constructor(input: string, reason: string) {
    super(`Could not extract page ID from URL: ${input} (${reason})`, ErrorCode.INVALID_PAGE_URL, 400, true, {
      input,
      reason,
    });
    this.input = input;
  }
}

export type NotionFetchReason =
  | 'unauthorized'
  | 'not_found'
  | 'rate_limited'
  | 'invalid_response'
  | 'unavailable';

const NOTION_FETCH_STATUS: Record<NotionFetchReason, number> = {
  unauthorized: 502,
  not_found: 404,
  rate_limited: 429,
  invalid_response: 502,
  unavailable: 502,
};

/**
 * A call to the Notion API failed. The reason decides the HTTP category
 * surfaced to our own callers.
 */
export class NotionFetchError extends AppError {
  public readonly reason: NotionFetchReason;
  public readonly upstreamStatus?: number;

  constructor(
    reason: NotionFetchReason,
    message: string,
    context?: Record<string, unknown> & { upstreamStatus?: number }
  ) {
    super(`Notion API request failed: ${message}`, ErrorCode.NOTION_FETCH_FAILED, NOTION_FETCH_STATUS[reason], true, {
      reason,
      ...context,
    });
    this.reason = reason;
    this.upstreamStatus = context?.upstreamStatus;
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Client errors
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  INVALID_PAGE_URL = 'INVALID_PAGE_URL',

  // Server errors
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  NOTION_FETCH_FAILED = 'NOTION_FETCH_FAILED',
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  requestId?: string;
  context?: Record<string, unknown>;
  stack?: string; // Only in development
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}
