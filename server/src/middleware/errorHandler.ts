/**
 * Centralized Error Handler Middleware
 * Handles all errors thrown in async routes and provides consistent error responses
 *
 * Must be added AFTER all routes in Express app:
 * app.use(errorHandler);
 *
 * Body shape for every failure: { error, type, details? }
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import {
    ValidationError,
    NotFoundError,
    EncodingError,
    StorageError,
    isCustomError,
    toIssueDetails,
} from '../utils/errors.js';
import { httpLogger } from '../utils/logger.js';

interface ErrorBody {
    error: string;
    type: string;
    details?: unknown;
    stack?: string;
}

/** body-parser marks malformed JSON with type 'entity.parse.failed' */
function isBodyParseError(err: Error): boolean {
    return 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Global error handling middleware
 * Catches all errors and formats consistent responses
 */
export const errorHandler: ErrorRequestHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void => {
    const send = (status: number, body: ErrorBody): void => {
        const logData = { method: req.method, path: req.path, status, type: body.type, error: err.message };
        if (status >= 500) {
            httpLogger.error({ ...logData, err }, 'Request failed');
        } else {
            httpLogger.debug(logData, 'Request rejected');
        }
        res.status(status).json(body);
    };

    if (err instanceof ValidationError) {
        send(400, { error: err.message, type: 'ValidationError', details: err.details });
        return;
    }

    if (err instanceof EncodingError) {
        send(400, { error: err.message, type: 'EncodingError' });
        return;
    }

    if (err instanceof NotFoundError) {
        send(404, { error: err.message, type: 'NotFoundError' });
        return;
    }

    if (err instanceof StorageError) {
        send(500, { error: err.message, type: 'StorageError' });
        return;
    }

    // Handle Zod validation errors
    if (err instanceof ZodError) {
        send(400, {
            error: 'Validation failed',
            type: 'ValidationError',
            details: toIssueDetails(err.issues),
        });
        return;
    }

    // Upload limits, unexpected file fields
    if (err instanceof multer.MulterError) {
        send(400, { error: err.message, type: 'UploadError' });
        return;
    }

    if (isBodyParseError(err)) {
        send(400, { error: 'Invalid JSON in request body', type: 'ValidationError' });
        return;
    }

    // Default 500 error
    const statusCode = isCustomError(err) ? err.statusCode : 500;
    const body: ErrorBody = {
        error: err.message || 'Internal server error',
        type: err.name || 'Error',
    };

    // Include stack trace in development
    if (process.env.NODE_ENV === 'development') {
        body.stack = err.stack;
    }

    send(statusCode, body);
};

export default errorHandler;
