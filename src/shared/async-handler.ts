import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Forwards a rejected handler promise to the error middleware.
 *
 *   router.get('/luck', asyncHandler(controller.getLeagueLuck));
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };
