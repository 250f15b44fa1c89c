/**
 * @file src/middleware/errorHandler.ts
 * @description Central error handling
 * @context Last middleware in the Express chain
 */

import { Request, Response, NextFunction } from 'express';
import { AdmissionDeniedError, AppError } from '../types/errors';
import { logger } from '../utils/logger';

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = req.id || 'unknown';

  let statusCode = 500;
  let errorCode = 'INTERNAL_ERROR';
  let message = 'Internal server error';

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    errorCode = err.errorCode;
    message = err.message;
  } else if (err instanceof SyntaxError) {
    statusCode = 400;
    errorCode = 'INVALID_JSON';
    message = 'Invalid JSON in request body';
  }

  const logMeta = {
    request_id: requestId,
    path: req.path,
    method: req.method,
    status: statusCode,
    error: err.message,
  };

  if (statusCode >= 500) {
    logger.error('Request error', { ...logMeta, stack: err.stack });
  } else {
    logger.warn('Request rejected', logMeta);
  }

  res.status(statusCode).json({
    status: 'error',
    error_code: errorCode,
    message,
    request_id: requestId,
    ...(err instanceof AdmissionDeniedError ? { reason: err.reason } : {}),
  });
}

export default errorHandler;
