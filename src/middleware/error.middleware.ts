import { Request, Response, NextFunction } from 'express';
import { AppException, ErrorCode, ExternalApiException, RequestAbortedException } from '../utils/exceptions';
import { metrics } from '../services/metrics.service';
import { requestIdOf } from './request-id.middleware';
import { logger } from '../config/logger.config';
import { env } from '../config/env.config';

export const errorHandler = (
  err: Error | AppException,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  // Nobody is listening for the body of an aborted request
  if (err instanceof RequestAbortedException) {
    logger.debug('Request aborted by client', { requestId: requestIdOf(req), path: req.path });
    if (res.headersSent) return next(err);
    return res.status(err.statusCode).end();
  }

  metrics.increment('errors_total');

  if (err instanceof AppException) {
    if (err instanceof ExternalApiException) {
      metrics.increment('upstream_errors_total');
    }

    logger.warn('Application error', {
      requestId: requestIdOf(req),
      code: err.errorCode,
      message: err.message,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method,
    });

    return res.status(err.statusCode).json({
      error: {
        code: err.errorCode,
        message: err.message,
      },
    });
  }

  const logPayload: Record<string, unknown> = {
    requestId: requestIdOf(req),
    error: err.message,
    path: req.path,
    method: req.method,
  };

  if (env.NODE_ENV !== 'production') {
    logPayload.stack = err.stack;
  } else {
    logPayload.errorType = err.constructor.name;
  }

  logger.error('Unexpected error', logPayload);

  return res.status(500).json({
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An error occurred while processing your request',
    },
  });
};

/**
 * 404 for paths no router claims.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      code: ErrorCode.NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
}
