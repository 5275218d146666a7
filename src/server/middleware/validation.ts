import type { z, ZodTypeAny } from 'zod';
import { BadRequestError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

export type RequestPart = 'body' | 'query' | 'params';

/**
 * Validate one part of a request against a Zod schema.
 * Handlers call this with the raw value and get the typed, defaulted result back.
 *
 * @throws BadRequestError listing every issue, so errors go through centralized error handling
 */
export function validateRequest<S extends ZodTypeAny>(schema: S, value: unknown, part: RequestPart): z.output<S> {
    const result = schema.safeParse(value);
    if (result.success) {
        return result.data;
    }

    const details = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
    }));
    logger.warn({ part, issues: details }, 'Request validation failed');
    throw new BadRequestError('Validation failed', { part, details });
}
