import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext, logger } from '../utils/logger.js';

const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Middleware to generate and attach request ID to each request
 * Also sets up async context for logging
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Reuse a caller-supplied request ID when it is sane
  const incoming = req.headers['x-request-id'];
  const requestId = typeof incoming === 'string' && incoming.length > 0 && incoming.length <= MAX_REQUEST_ID_LENGTH
    ? incoming
    : randomUUID();

  res.setHeader('X-Request-ID', requestId);

  const context: Record<string, unknown> = {
    requestId,
    method: req.method,
    path: req.path,
  };

  requestContext.run(context, () => {
    logger.info({
      method: req.method,
      path: req.path,
      ip: req.ip,
    }, 'Incoming request');

    req.requestId = requestId;
    req.logger = logger.child(context);

    next();
  });
}
