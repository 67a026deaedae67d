import type { Request, Response, NextFunction } from 'express';
import crypto from 'node:crypto';
import { CALLER_HEADER } from './caller.js';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Tags each request with a short id (echoed as X-Request-Id) and logs it
 * twice: on arrival with the claimed caller, and on completion with status
 * and duration.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = crypto.randomUUID().slice(0, 8);
  const startedAt = Date.now();
  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  const caller = req.header(CALLER_HEADER);
  console.log(
    `[${new Date(startedAt).toISOString()}] [${requestId}] ${req.method} ${req.path}${caller ? ` caller=${caller}` : ''}`,
  );

  res.on('finish', () => {
    console.log(`[${new Date().toISOString()}] [${requestId}] ${res.statusCode} ${Date.now() - startedAt}ms`);
  });
  next();
}
