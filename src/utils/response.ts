/**
 * API Response Helpers
 *
 * Enforces the standardized response contract:
 * Success: { success: true, data: ... }
 * Error:   { success: false, error: ..., details?: ... }
 */

import { Response } from 'express';

interface SuccessResponse<T> {
    success: true;
    data: T;
}

interface ErrorResponse<D> {
    success: false;
    error: string;
    details?: D;
}

export function successResponse<T>(res: Response, data: T, statusCode = 200): Response<SuccessResponse<T>> {
    return res.status(statusCode).json({
        success: true,
        data
    });
}

export function errorResponse<D = undefined>(
    res: Response,
    error: string,
    statusCode: number,
    details?: D
): Response<ErrorResponse<D>> {
    const body: ErrorResponse<D> = { success: false, error };
    if (details !== undefined) {
        body.details = details;
    }
    return res.status(statusCode).json(body);
}
