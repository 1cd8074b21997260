import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createLogger } from '../utils/logger';
import { ReconciliationError } from '../utils/errors';
import { ApiError } from '../types/reconciliation';

const logger = createLogger('http');

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Log the error
  logger.error('API Error:', {
    message: err.message,
    stack: err.stack,
    url: req.url,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  });

  // Default error response
  let statusCode = 500;
  let errorResponse: ApiError = {
    code: 'INTERNAL_SERVER_ERROR',
    message: 'An unexpected error occurred',
    timestamp: new Date().toISOString()
  };

  // Handle specific error types
  if (err instanceof ZodError) {
    statusCode = 400;
    errorResponse = {
      code: 'VALIDATION_ERROR',
      message: err.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; '),
      timestamp: new Date().toISOString()
    };
  } else if (err instanceof ReconciliationError) {
    statusCode = err.statusCode;
    errorResponse = {
      code: err.code,
      message: err.message,
      timestamp: new Date().toISOString()
    };
  }

  // Don't expose internal error details in production
  if (process.env.NODE_ENV === 'production') {
    delete errorResponse.details;
  } else {
    errorResponse.details = {
      ...(err instanceof ReconciliationError ? err.details : {}),
      stack: err.stack,
      originalMessage: err.message
    };
  }

  res.status(statusCode).json({
    success: false,
    error: errorResponse
  });
}

// Async error wrapper utility
export function asyncHandler<T extends Request, U extends Response>(
  fn: (req: T, res: U, next: NextFunction) => Promise<unknown>
) {
  return (req: T, res: U, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
