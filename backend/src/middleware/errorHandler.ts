import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message);
    this.name = 'AppError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get isOperational(): boolean {
    return this.statusCode < 500;
  }
}

const hasStatus = (error: unknown): error is Error & { status: number } =>
  error instanceof Error && 'status' in error && typeof error.status === 'number';

// Express recognises error middleware by its four parameters
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (err instanceof AppError) {
    const log = err.isOperational ? logger.warn.bind(logger) : logger.error.bind(logger);
    log('Request failed', {
      message: err.message,
      code: err.code,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method,
    });

    res.status(err.statusCode).json({
      success: false,
      error: err.message,
      ...(err.code && { code: err.code }),
    });
    return;
  }

  // body-parser errors (malformed JSON, oversized payloads) carry a status
  if (hasStatus(err) && err.status >= 400 && err.status < 500) {
    logger.warn('Rejected request body', {
      message: err.message,
      path: req.path,
      method: req.method,
    });
    res.status(err.status).json({
      success: false,
      error: err.message,
    });
    return;
  }

  logger.error('Unhandled error:', err);

  const isProduction = process.env.NODE_ENV === 'production';
  res.status(500).json({
    success: false,
    error: 'Internal server error',
    ...(!isProduction && err instanceof Error && { message: err.message }),
  });
};
