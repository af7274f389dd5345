import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../config/logger';

export interface AppError extends Error {
    statusCode?: number;
    status?: string;
    isOperational?: boolean;
}

export const errorHandler = (
    err: AppError,
    req: Request,
    res: Response,
    // express recognises error middleware by its four parameters
    _next: NextFunction
): void => {
    const statusCode = err.statusCode || 500;
    const status = err.status || 'error';

    logger.error('API error occurred', {
        message: err.message,
        stack: err.stack,
        statusCode,
        path: req.path,
        method: req.method,
        ip: req.ip,
        query: req.query
    });

    const errorResponse: Record<string, unknown> = {
        status,
        message: err.message || 'Internal Server Error',
        timestamp: new Date().toISOString(),
        path: req.path,
        method: req.method
    };

    if (process.env.NODE_ENV == 'development') {
        errorResponse.stack = err.stack;
    }

    res.status(statusCode).json(errorResponse);
};

export class ValidationError extends Error {
    statusCode = 400;
    status = 'fail';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends Error {
    statusCode = 404;
    status = 'fail';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}

export class DatabaseError extends Error {
    statusCode = 500;
    status = 'error';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'DatabaseError';
    }
}

export class NarrativeGenerationError extends Error {
    statusCode = 502;
    status = 'error';
    isOperational = true;

    constructor(message: string) {
        super(message);
        this.name = 'NarrativeGenerationError';
    }
}

/**
 * The single failure a workflow run surfaces. `stage` is the state the run was
 * in when it failed and `statePath` every state it visited, ending in FAILED.
 * The status code follows the underlying cause.
 */
export class WorkflowError extends Error {
    statusCode: number;
    status: string;
    isOperational = true;
    stage: string;
    statePath: string[];
    cause: unknown;

    constructor(message: string, stage: string, cause?: unknown, statePath: string[] = []) {
        super(message);
        this.name = 'WorkflowError';
        this.stage = stage;
        this.statePath = statePath;
        this.cause = cause;

        const causeStatus = cause instanceof Error ? Reflect.get(cause, 'statusCode') : undefined;
        this.statusCode = typeof causeStatus === 'number' ? causeStatus : 500;
        this.status = this.statusCode < 500 ? 'fail' : 'error';
    }
}

export const asyncHandler = (
    fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler => {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
};
