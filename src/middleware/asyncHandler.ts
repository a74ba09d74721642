/**
 * Async Handler Middleware
 *
 * Intake and sync controllers are async; a rejection (an UnknownResourceError,
 * a bug in a mapper) goes to errorHandler instead of becoming an unhandled
 * rejection.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncController = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

export function asyncHandler(controller: AsyncController): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        controller(req, res, next).catch(next);
    };
}
