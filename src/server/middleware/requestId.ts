import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { requestContext, logger } from '../utils/logger.js';

/**
 * Middleware to generate and attach request ID to each request
 * Also sets up async context for logging
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Generate or use existing request ID
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : randomUUID();

  // Set request ID in response header
  res.setHeader('X-Request-ID', requestId);

  const context: Record<string, unknown> = {
    requestId,
    method: req.method,
    path: req.path,
  };

  // Run request in async context; child loggers created downstream pick it up
  requestContext.run(context, () => {
    logger.info({
      requestId,
      method: req.method,
      path: req.path,
      ip: req.ip || req.socket.remoteAddress,
    }, 'Incoming request');

    next();
  });
}
