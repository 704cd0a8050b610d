import { randomUUID } from 'crypto';

import { Request, Response, NextFunction } from 'express';

import { config } from '../config/index';
import { createRequestLogger, logger, Logger } from '../config/logger';
import '../types/express';

/**
 * Request ID middleware
 * - Reuses the incoming request ID header or generates a new UUID
 * - Echoes it in the response headers for client correlation
 * - Attaches a request-scoped logger
 */
export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const headerName = config.log.requestIdHeader;
  const requestId = req.get(headerName) || randomUUID();

  req.requestId = requestId;
  req.logger = createRequestLogger(requestId);

  res.setHeader(headerName, requestId);

  next();
};

export const getRequestLogger = (req: Request): Logger => req.logger ?? logger;
