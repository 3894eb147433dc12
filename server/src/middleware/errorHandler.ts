/**
 * Centralized Error Handler Middleware
 * Handles all errors thrown in async routes and provides consistent error responses
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { httpLogger } from '../utils/logger.js';
import {
    ValidationError,
    NotFoundError,
    UnauthorizedError,
    isCustomError,
} from '../utils/errors.js';
import { formatZodIssues } from './asyncHandler.js';

/**
 * Global error handling middleware
 * Catches all errors and formats consistent responses
 */
export const errorHandler: ErrorRequestHandler = (
    err: unknown,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const error = err instanceof Error ? err : new Error(String(err));

    const errorLog = {
        method: req.method,
        path: req.path,
        error: error.message,
        type: error.name,
        ...(process.env.NODE_ENV === 'development' ? { stack: error.stack } : {}),
    };

    if (isCustomError(error) && error.statusCode < 500) {
        httpLogger.warn(errorLog, 'Request failed');
    } else {
        httpLogger.error(errorLog, 'Unhandled request error');
    }

    if (error instanceof ValidationError) {
        res.status(400).json({
            error: error.message,
            type: 'ValidationError',
            details: error.details,
        });
        return;
    }

    if (error instanceof NotFoundError) {
        res.status(404).json({
            error: error.message,
            type: 'NotFoundError',
            resourceType: error.resourceType,
            resourceId: error.resourceId,
        });
        return;
    }

    if (error instanceof UnauthorizedError) {
        res.status(401).json({
            error: error.message,
            type: 'UnauthorizedError',
        });
        return;
    }

    // Body parser rejects malformed JSON with a 400 status
    if (error instanceof SyntaxError && isCustomError(error) && error.statusCode === 400) {
        res.status(400).json({
            error: 'Malformed JSON body',
            type: 'ValidationError',
        });
        return;
    }

    if (error instanceof ZodError) {
        res.status(400).json({
            error: 'Validation failed',
            type: 'ValidationError',
            details: formatZodIssues(error),
        });
        return;
    }

    // Default 500 error
    const statusCode = isCustomError(error) ? error.statusCode : 500;
    const response: {
        error: string;
        type: string;
        stack?: string;
    } = {
        error: statusCode >= 500 ? 'Internal server error' : error.message,
        type: error.name || 'Error',
    };

    if (process.env.NODE_ENV === 'development') {
        response.stack = error.stack;
    }

    res.status(statusCode).json(response);
};

export default errorHandler;
