import type { Request, Response, NextFunction } from 'express';

/**
 * Wrap async route handlers so rejected promises reach the error middleware
 *
 * Usage:
 * ```typescript
 * router.get('/', asyncHandler(async (req, res) => {
 *   res.json(await model.findAll());
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
