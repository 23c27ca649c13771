import { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';
import { logger } from '../utils/logger';

export const validateRequest = (req: Request, res: Response, next: NextFunction): void => {
  const errors = validationResult(req);
  if (errors.isEmpty()) {
    next();
    return;
  }

  const details = errors.array();
  logger.debug('Request validation failed', { path: req.path, errors: details.length });

  res.status(400).json({
    success: false,
    error: 'Validation failed',
    details,
  });
};
