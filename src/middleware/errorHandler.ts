/**
 * Error Handler Middleware
 *
 * Last middleware in the chain. Operational errors (AppError) answer with their
 * own status; body-parser failures with 400/413; anything else is logged with
 * its stack and answered with 500.
 */

import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/appError';
import { errorResponse } from '../utils/response';
import { logger } from '../services/observabilityService';

interface BodyParserError extends Error {
    status: number;
    type: string;
}

function isBodyParserError(err: Error): err is BodyParserError {
    return 'type' in err && typeof err.type === 'string'
        && 'status' in err && typeof err.status === 'number';
}

export function notFoundHandler(req: Request, res: Response): void {
    errorResponse(res, `Route ${req.method} ${req.path} not found`, 404);
}

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
    if (res.headersSent) {
        next(err);
        return;
    }

    if (err instanceof AppError) {
        logger.warn('Operational error', {
            correlationId: req.correlationId,
            error: err.name,
            message: err.message,
            path: req.path
        });
        errorResponse(res, err.message, err.statusCode);
        return;
    }

    if (isBodyParserError(err)) {
        const message = err.type === 'entity.parse.failed' ? 'Request body is not valid JSON' : err.message;
        errorResponse(res, message, err.status);
        return;
    }

    logger.error('Unhandled error', err, {
        correlationId: req.correlationId,
        method: req.method,
        path: req.path,
        ip: req.ip
    });
    errorResponse(res, 'Internal server error', 500);
}
