import { Request, Response, NextFunction } from 'express';
import { requestIdOf } from './request-id.middleware';
import { logger } from '../config/logger.config';
import { metrics } from '../services/metrics.service';

/**
 * Gives every request an AbortController that fires when the client
 * disconnects before the response is written. Services pass the signal
 * down to the data feed so outstanding upstream fetches are cancelled.
 */
export function requestAbortMiddleware(req: Request, res: Response, next: NextFunction): void {
  const controller = new AbortController();
  res.locals.abortController = controller;

  res.on('close', () => {
    if (!res.writableFinished && !controller.signal.aborted) {
      metrics.increment('requests_aborted_total');
      logger.debug('Client disconnected, aborting upstream work', {
        requestId: requestIdOf(req),
        path: req.path,
      });
      controller.abort();
    }
  });

  next();
}

/**
 * The abort signal for this request, when the middleware is installed.
 */
export function requestSignal(res: Response): AbortSignal | undefined {
  const controller: unknown = res.locals.abortController;
  return controller instanceof AbortController ? controller.signal : undefined;
}
