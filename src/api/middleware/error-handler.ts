import { Request, Response, NextFunction } from 'express';
import { AppError } from '../../utils/errors';
import { errorDetails, logger } from '../../services/logging';

export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
) {
    if (err instanceof AppError) {
        if (err.statusCode >= 500) {
            logger.error('Request failed', { path: req.path, code: err.code, ...err.meta, ...errorDetails(err) });
        }
        return res.status(err.statusCode).json({
            status: 'error',
            code: err.code,
            message: err.message
        });
    }

    logger.error('Unexpected error', { path: req.path, ...errorDetails(err) });

    return res.status(500).json({
        status: 'error',
        message: 'Internal server error'
    });
}

export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}
