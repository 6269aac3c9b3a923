import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import type { ErrorBody } from '../types/service';

export interface ApiError extends Error {
    statusCode?: number;
    status?: number;
}

export class BadRequestError extends Error implements ApiError {
    readonly statusCode = 400;

    constructor(message: string) {
        super(message);
        this.name = 'BadRequestError';
    }
}

function clientStatus(err: ApiError): number | undefined {
    const statusCode = err.statusCode ?? err.status;
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
        return statusCode;
    }
    return undefined;
}

export function notFoundHandler(req: Request, res: Response<ErrorBody>) {
    res.status(404).json({ error: 'not found' });
}

export function errorHandler(
    err: ApiError,
    req: Request,
    res: Response<ErrorBody>,
    next: NextFunction
) {
    const statusCode = clientStatus(err);
    if (statusCode !== undefined) {
        logger.warn('Client error', {
            error: err.message,
            statusCode,
            path: req.path,
            method: req.method
        });
        res.status(statusCode).json({ error: err.message });
        return;
    }

    logger.error('Internal error', {
        error: err.message,
        stack: err.stack,
        path: req.path,
        method: req.method
    });

    res.status(500).json({ error: 'internal server error' });
}
