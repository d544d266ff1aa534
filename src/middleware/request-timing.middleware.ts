import { Request, Response, NextFunction } from 'express';
import { requestIdOf } from './request-id.middleware';
import { logger } from '../config/logger.config';
import { metrics } from '../services/metrics.service';

// Season reports fan out to ~35 upstream calls; anything slower than this is worth a look
const SLOW_REQUEST_MS = 3000;

export function requestTimingMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - start;
    const path = req.route?.path || req.path;
    const status = res.statusCode;

    metrics.increment('http_requests_total');
    metrics.recordDuration('http_request_ms', duration);

    if (duration > SLOW_REQUEST_MS) {
      logger.warn('Slow request detected', {
        requestId: requestIdOf(req),
        method: req.method,
        path,
        status,
        durationMs: duration,
      });
    } else {
      logger.debug('Request completed', { method: req.method, path, status, durationMs: duration });
    }
  });

  next();
}
