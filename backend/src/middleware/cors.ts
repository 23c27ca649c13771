import { Request, Response, NextFunction, RequestHandler } from 'express';
import cors from 'cors';
import { logger } from '../utils/logger';

// Validate origin format
const isValidOrigin = (origin: string): boolean => {
  let url: URL;
  try {
    url = new URL(origin);
  } catch {
    return false;
  }

  if (!['http:', 'https:'].includes(url.protocol)) {
    return false;
  }

  // No wildcard subdomains
  if (url.hostname.includes('*')) {
    return false;
  }

  if (url.hostname === 'localhost' && process.env.NODE_ENV === 'production') {
    return false;
  }

  return true;
};

export const filterValidOrigins = (origins: string[]): string[] =>
  origins.filter(origin => {
    const isValid = isValidOrigin(origin);
    if (!isValid) {
      logger.warn('Invalid CORS origin filtered out', { origin });
    }
    return isValid;
  });

/**
 * CORS for the scoring API. Requests without an Origin header (CLI tools,
 * server-to-server batch jobs) are allowed.
 */
export const createCorsMiddleware = (configuredOrigins: string[]): RequestHandler => {
  const origins = filterValidOrigins(configuredOrigins);

  const corsMiddleware = cors({
    origin: (origin, callback) => {
      if (!origin || origins.includes(origin)) {
        callback(null, true);
        return;
      }
      logger.warn('CORS origin blocked', { origin, allowedOrigins: origins });
      callback(new Error(`CORS policy violation: Origin '${origin}' not allowed`), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Origin', 'X-Requested-With', 'Content-Type', 'Accept'],
    exposedHeaders: ['RateLimit-Limit', 'RateLimit-Remaining', 'RateLimit-Reset'],
    optionsSuccessStatus: 204,
    maxAge: 86400,
  });

  return (req: Request, res: Response, next: NextFunction) => {
    corsMiddleware(req, res, (err?: unknown) => {
      if (err) {
        logger.error('CORS error', {
          error: err instanceof Error ? err.message : String(err),
          origin: req.headers.origin,
          method: req.method,
          path: req.path,
        });
        res.status(403).json({
          success: false,
          error: 'CORS policy violation',
        });
        return;
      }
      next();
    });
  };
};
