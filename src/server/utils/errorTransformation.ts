/**
 * Error transformation utilities
 * Converts various error types to the standardized response format
 */
import type { Request } from 'express';
import { isAppError, toAppError, ErrorCode, type ErrorResponse } from '../types/errors.js';

const GENERIC_ERROR_MESSAGE = 'An unexpected error occurred';

/**
 * Body-parser reports malformed JSON as a SyntaxError carrying status 400
 */
function isJsonSyntaxError(error: unknown): error is SyntaxError & { status: number } {
  return error instanceof SyntaxError && 'status' in error && error.status === 400;
}

/**
 * Transform error to standardized error response
 */
export function transformErrorToResponse(
  error: unknown,
  req: Request,
  includeStack = false
): ErrorResponse {
  const timestamp = new Date().toISOString();
  const requestId = req.requestId ? { requestId: req.requestId } : {};

  if (isJsonSyntaxError(error)) {
    return {
      error: 'Bad Request',
      code: ErrorCode.BAD_REQUEST,
      message: 'Request body is not valid JSON',
      statusCode: 400,
      timestamp,
      path: req.path,
      ...requestId,
    };
  }

  const appError = toAppError(error);

  // Non-operational errors are programming faults; their messages stay in the logs
  const exposeMessage = appError.isOperational || includeStack;
  const message = exposeMessage ? appError.message : GENERIC_ERROR_MESSAGE;

  return {
    error: isAppError(error) ? appError.name : 'Internal Server Error',
    code: appError.code,
    message,
    statusCode: appError.statusCode,
    timestamp,
    path: req.path,
    ...requestId,
    ...(appError.context && appError.isOperational ? { context: appError.context } : {}),
    ...(includeStack && appError.stack ? { stack: appError.stack } : {}),
  };
}
