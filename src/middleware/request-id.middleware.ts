import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

declare global {
  namespace Express {
    interface Request {
      requestId: string;
    }
  }
}

// Client-supplied ids end up in log lines
const REQUEST_ID_PATTERN = /^[a-zA-Z0-9-]{1,128}$/;

/**
 * Correlates a report request with its upstream fetches in the logs.
 * Reuses X-Request-ID from the caller when it is well-formed.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const clientId = typeof header === 'string' ? header : undefined;

  req.requestId = clientId && REQUEST_ID_PATTERN.test(clientId) ? clientId : randomUUID();
  res.setHeader('X-Request-ID', req.requestId);

  next();
}

export function requestIdOf(req: Request): string | undefined {
  return req.requestId;
}
