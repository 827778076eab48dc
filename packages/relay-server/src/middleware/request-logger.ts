import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Logger } from '../logger.js';

/**
 * Logs method, path, status and response time of every request at debug level.
 * Never logs bodies: they carry agent messages.
 */
export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();
    res.on('finish', () => {
      logger.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'request');
    });
    next();
  };
}
