import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { transformErrorToResponse } from '../utils/errorTransformation.js';
import { ErrorCode } from '../types/errors.js';

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 *
 * Client errors (4xx) are logged at warn level, everything else at error level.
 */
export function errorHandler(
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const includeStack = process.env.NODE_ENV === 'development';
    const errorResponse = transformErrorToResponse(err, req, includeStack);
    const statusCode = errorResponse.statusCode;
    const logContext = {
        error: err,
        message: err instanceof Error ? err.message : String(err),
        path: req.path,
        method: req.method,
        statusCode,
    };

    // Request-scoped logger carries requestId, method and path
    const log = req.logger ?? logger;
    if (statusCode < 500) {
        log.warn(logContext, 'Request failed');
    } else {
        log.error(logContext, 'Unhandled error');
    }

    // Client already has a (partial) response; nothing left to send
    if (res.headersSent) {
        log.debug({ path: req.path }, 'Error after headers were sent, closing response');
        res.end();
        return;
    }

    const retryAfter = errorResponse.context?.retryAfter;
    if (typeof retryAfter === 'number') {
        res.setHeader('Retry-After', String(Math.ceil(retryAfter)));
    }

    res.status(errorResponse.statusCode).json(errorResponse);
}

/**
 * Fallback for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
    res.status(404).json({
        error: 'Not Found',
        code: ErrorCode.NOT_FOUND,
        message: `Route ${req.method} ${req.path} not found`,
        statusCode: 404,
        timestamp: new Date().toISOString(),
        path: req.path,
        ...(req.requestId ? { requestId: req.requestId } : {}),
    });
}
