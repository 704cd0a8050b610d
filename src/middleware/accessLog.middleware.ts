import { Request, Response, NextFunction } from 'express';

import { getRequestLogger } from './requestId.middleware';

/**
 * Logs method, path, status code and response time once the response
 * has been written.
 */
export const accessLogMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const startTime = Date.now();

  res.on('finish', () => {
    const entry = {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      responseTime: Date.now() - startTime,
      userAgent: req.get('user-agent'),
    };
    const requestLogger = getRequestLogger(req);

    if (res.statusCode >= 500) {
      requestLogger.error(entry, 'Request failed');
    } else if (res.statusCode >= 400) {
      requestLogger.warn(entry, 'Request rejected');
    } else {
      requestLogger.info(entry, 'Request completed');
    }
  });

  next();
};
