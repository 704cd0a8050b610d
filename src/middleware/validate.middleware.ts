import { Request, Response, NextFunction } from 'express';
import { ZodSchema, ZodError } from 'zod';

import { getRequestLogger } from './requestId.middleware';

export const validateQuery = (schema: ZodSchema) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    try {
      req.query = schema.parse(req.query);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        getRequestLogger(req).warn(
          { method: req.method, path: req.path, errors: error.errors },
          'Query validation failed'
        );
        res.status(400).json({
          success: false,
          message: 'Query validation error',
          code: 'VALIDATION_ERROR',
          details: error.errors.map((err) => ({
            path: err.path.join('.'),
            message: err.message,
          })),
        });
        return;
      }
      next(error);
    }
  };
};
