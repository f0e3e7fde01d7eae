/**
 * Route error handling helpers
 */
import type { Request, Response, NextFunction } from 'express';

/**
 * Wrap an async route handler so rejected promises reach the error middleware
 *
 * Usage:
 * ```typescript
 * router.get('/:id', asyncHandler(async (req, res) => {
 *   const data = await service.getData(req.params.id);
 *   res.json(data);
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Render any thrown value as a message string
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
