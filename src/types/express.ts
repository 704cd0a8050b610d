import type { Logger } from '../config/logger';

// Populated by requestIdMiddleware
declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      logger?: Logger;
    }
  }
}

export {};
