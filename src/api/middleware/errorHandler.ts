import { Request, Response, NextFunction } from 'express';
import { isAppError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  if (isAppError(err)) {
    if (err.statusCode >= 500) {
      logger.error('Request failed', { path: req.path, code: err.code, error: err.message });
    } else {
      logger.debug('Request rejected', { path: req.path, code: err.code, error: err.message });
    }
    res.status(err.statusCode).json({ error: err.message });
    return;
  }

  // Body parser failures carry their own 4xx status
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    res.status(err.status).json({ error: 'Invalid request body' });
    return;
  }

  logger.error('Error occurred:', { path: req.path, error: err.message, stack: err.stack });

  res.status(500).json({
    error: 'Internal server error',
    ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
  });
}
