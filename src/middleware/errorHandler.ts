import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.warn({ error: err, cause: err.cause, path: req.path }, 'Request failed');
    } else {
      logger.debug({ code: err.code, message: err.message, path: req.path }, 'Request rejected');
    }

    res.status(err.statusCode).json({
      error: {
        message: err.message,
        status: err.statusCode,
        code: err.code,
      },
    });
    return;
  }

  logger.error({ error: err, path: req.path }, 'Unexpected error');
  res.status(500).json({
    error: {
      message: 'Internal server error',
      status: 500,
    },
  });
}
