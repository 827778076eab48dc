import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import type { Logger } from '../logger.js';
import { RelayError } from '../errors.js';

const STATUS_BY_KIND = { validation: 400, not_found: 404 } as const;

// body-parser and http-errors tag caller mistakes with a 4xx `status` and a `type`.
function clientFault(err: Error): { status: number; type: string } | undefined {
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status > 499) return undefined;
  const type = 'type' in err && typeof err.type === 'string' ? err.type : 'bad_request';
  return { status, type };
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof RelayError) {
      res.status(STATUS_BY_KIND[err.kind]).json({ error: err.kind, message: err.message });
      return;
    }
    const fault = clientFault(err);
    if (fault) {
      logger.debug({ error: err, path: req.path, status: fault.status }, 'rejected request');
      res.status(fault.status).json({ error: fault.type, message: err.message });
      return;
    }
    logger.error({ error: err, path: req.path }, 'unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
}
