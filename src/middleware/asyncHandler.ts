import { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncRequestHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Wrap async route handlers so thrown errors (a LeaveError included) reach the
 * error handler middleware.
 */
export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}
