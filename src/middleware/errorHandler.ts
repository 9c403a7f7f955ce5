import { Request, Response, NextFunction } from 'express';
import { HTTP_STATUS_BY_CODE, LeaveError } from '../utils/errors';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof LeaveError) {
    res.status(HTTP_STATUS_BY_CODE[err.code]).json({
      success: false,
      code: err.code,
      message: err.message,
    });
    return;
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ success: false, message: 'Malformed JSON body' });
    return;
  }

  console.error('Unhandled error:', err.message, err.stack);
  res.status(500).json({
    success: false,
    message: 'Internal server error',
  });
}

export function notFound(_req: Request, res: Response) {
  res.status(404).json({ success: false, message: 'Route not found' });
}
