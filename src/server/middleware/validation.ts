import type { Request, Response, NextFunction } from 'express';
import { z, ZodError, type ZodSchema } from 'zod';
import { BadRequestError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Validation middleware factory
 * Validates request body or query against a Zod schema
 * Passes BadRequestError to next() if validation fails, so errors go through centralized error handling
 */
type ValidationSchema =
    | { body: ZodSchema; query?: ZodSchema }
    | { body?: ZodSchema; query: ZodSchema };

export function validate(schema: ValidationSchema) {
    return (req: Request, _res: Response, next: NextFunction) => {
        try {
            if (schema.body) {
                req.body = schema.body.parse(req.body);
            }
            if (schema.query) {
                // Only checked here; handlers re-parse to get typed values
                schema.query.parse(req.query);
            }
            next();
        } catch (error) {
            if (error instanceof ZodError) {
                const details = error.issues.map((e) => ({
                    path: e.path.join('.'),
                    message: e.message,
                }));
                logger.warn(
                    {
                        path: req.path,
                        method: req.method,
                        issues: details,
                    },
                    'Request validation failed'
                );
                next(new BadRequestError(details[0]?.message ?? 'Validation failed', {
                    details,
                }));
            } else {
                next(error);
            }
        }
    };
}

/**
 * Common validation schemas
 */
export const commonSchemas = {
    // URL shape is left to the page-ID extractor, which reports INVALID_PAGE_URL
    pageUrl: z
        .string({ required_error: 'page_url is required', invalid_type_error: 'page_url must be a string' })
        .trim()
        .min(1, 'page_url cannot be empty'),
};
