/**
 * @file src/middleware/requestLogger.ts
 * @description Request logging with request_id
 * @context Assigns req.id (X-Request-Id or a fresh UUID) to every request
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';

declare global {
  namespace Express {
    interface Request {
      id?: string;
    }
  }
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = (typeof header === 'string' && header) || uuidv4();
  const startTime = Date.now();

  req.id = requestId;
  res.setHeader('X-Request-Id', requestId);

  logger.info('Incoming request', {
    request_id: requestId,
    method: req.method,
    path: req.path,
    user_agent: req.headers['user-agent'],
  });

  res.on('finish', () => {
    logger.info('Request completed', {
      request_id: requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Date.now() - startTime,
    });
  });

  next();
}

export default requestLogger;
