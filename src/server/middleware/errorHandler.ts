import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { logger } from '../utils/logger.js';
import {
    AppError,
    BadRequestError,
    NotFoundError,
    PayloadTooLargeError,
    toAppError,
    type ErrorResponse,
} from '../types/errors.js';

/**
 * Map upload-layer errors onto the AppError hierarchy
 */
function normalizeError(err: unknown): AppError {
    if (err instanceof multer.MulterError) {
        if (err.code === 'LIMIT_FILE_SIZE') {
            return new PayloadTooLargeError('Uploaded file exceeds the size limit', { field: err.field });
        }
        return new BadRequestError(`Upload rejected: ${err.message}`, { code: err.code, field: err.field });
    }
    if (err instanceof SyntaxError && 'body' in err) {
        // express.json() parse failure
        return new BadRequestError('Request body is not valid JSON');
    }
    return toAppError(err);
}

/**
 * Build the standardized error response
 */
export function transformErrorToResponse(err: unknown, req: Request, includeStack = false): ErrorResponse {
    const appError = normalizeError(err);
    return {
        error: appError.isOperational ? appError.message : 'Internal Server Error',
        code: appError.code,
        message: appError.isOperational ? appError.message : 'An unexpected error occurred',
        statusCode: appError.statusCode,
        timestamp: new Date().toISOString(),
        path: req.path,
        ...(appError.isOperational && appError.context ? { context: appError.context } : {}),
        ...(includeStack && appError.stack ? { stack: appError.stack } : {}),
    };
}

/**
 * 404 for unmatched routes; registered after all routers
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
}

/**
 * Centralized error handling middleware
 * Must be registered LAST in Express app
 *
 * This middleware:
 * - Transforms all errors to standardized ErrorResponse format
 * - Logs errors with appropriate context
 * - Returns consistent error responses to clients
 */
export function errorHandler(
    err: Error | unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const errorResponse = transformErrorToResponse(err, req, process.env.NODE_ENV === 'development');

    if (errorResponse.statusCode >= 500) {
        logger.error({
            error: err,
            message: err instanceof Error ? err.message : String(err),
            stack: err instanceof Error ? err.stack : undefined,
            path: req.path,
            method: req.method,
        }, 'Unhandled error');
    } else {
        logger.info({
            code: errorResponse.code,
            message: errorResponse.message,
            path: req.path,
            method: req.method,
        }, 'Request rejected');
    }

    // Client has already disconnected or the handler already responded
    if (res.headersSent || res.socket?.destroyed) {
        logger.debug({ path: req.path }, 'Response already sent or client gone; skipping error body');
        return;
    }

    res.status(errorResponse.statusCode).json(errorResponse);
}
