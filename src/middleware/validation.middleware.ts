import { Request, Response, NextFunction } from 'express';
import { ZodSchema } from 'zod';
import { ErrorCode } from '../utils/exceptions';

/**
 * Validates route params or body against a zod schema and answers 400 with
 * the first issue. Query strings are parsed in the controllers, since
 * Express exposes req.query as a getter.
 */
export function validateRequest(schema: ZodSchema, source: 'body' | 'params' = 'params') {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req[source]);

    if (!result.success) {
      const firstError = result.error.issues[0];
      res.status(400).json({
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: firstError ? firstError.message : 'Validation failed',
        },
      });
      return;
    }

    req[source] = result.data;
    next();
  };
}
