import { Request, Response, NextFunction } from 'express';
import { env } from '../config/env';
import { AppError, DeliveryError, ServiceError } from '../utils/errors';
import { logger } from '../utils/logger';

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  if (err instanceof DeliveryError) {
    return res.status(502).json({
      success: false,
      error: 'Delivery provider error',
    });
  }

  if (err instanceof ServiceError) {
    return res.status(503).json({
      success: false,
      error: 'Service temporarily unavailable',
    });
  }

  if (err instanceof AppError && err.isOperational) {
    return res.status(err.statusCode).json({
      success: false,
      error: err.message,
    });
  }

  // Don't leak internal errors in production
  const message = env.NODE_ENV === 'production' ? 'Internal server error' : err.message;

  res.status(err instanceof AppError ? err.statusCode : 500).json({
    success: false,
    error: message,
  });
}
