import { Request, Response, NextFunction } from 'express';

import { config } from '../config/index';
import { AppError } from '../utils/errors';
import { getRequestLogger } from './requestId.middleware';

export const errorMiddleware = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const requestLogger = getRequestLogger(req);

  const statusCode = err.statusCode || 500;
  const logEntry = {
    error: err.message,
    stack: err.stack,
    url: req.url,
    method: req.method,
    statusCode,
    code: err.code,
    requestId: req.requestId,
  };
  if (statusCode >= 500) {
    requestLogger.error(logEntry, 'Request error');
  } else {
    requestLogger.warn(logEntry, 'Request error');
  }

  // A file stream broke mid-transfer: drop the connection so the client sees a short read
  if (res.headersSent) {
    req.socket.destroy();
    return;
  }

  res.status(statusCode).json({
    success: false,
    message: err.message || 'Internal server error',
    code: err.code || 'INTERNAL_ERROR',
    ...(config.app.env === 'development' && { stack: err.stack }),
  });
};

export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
