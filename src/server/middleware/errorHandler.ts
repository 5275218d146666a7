import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { NotFoundError, toAppError, type ErrorResponse } from '../types/errors.js';

/**
 * Transform any thrown value to the standardized ErrorResponse
 */
export function transformErrorToResponse(err: unknown, req: Request, includeStack: boolean): ErrorResponse {
    const appError = toAppError(err);
    const response: ErrorResponse = {
        error: appError.name,
        code: appError.code,
        // Internal failures do not leak their message
        message: appError.isOperational ? appError.message : 'An unexpected error occurred',
        statusCode: appError.statusCode,
        timestamp: new Date().toISOString(),
        path: req.path,
    };
    if (appError.isOperational && appError.context) {
        response.context = appError.context;
    }
    if (includeStack && appError.stack) {
        response.stack = appError.stack;
    }
    return response;
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    const response = transformErrorToResponse(err, req, process.env.NODE_ENV === 'development');

    if (response.statusCode >= 500) {
        logger.error({
            error: err,
            path: req.path,
            method: req.method,
        }, 'Unhandled error');
    } else {
        logger.info({
            code: response.code,
            message: response.message,
            path: req.path,
            method: req.method,
        }, 'Request failed');
    }

    if (res.headersSent) {
        logger.debug({ path: req.path }, 'Response already started, not sending error body');
        return;
    }
    res.status(response.statusCode).json(response);
}

/**
 * Fallback for unmatched routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}
