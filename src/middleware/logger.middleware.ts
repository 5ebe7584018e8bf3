import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';

const SKIP_PATHS = ['/health', '/docs', '/openapi.json', '/favicon.ico'];

export const SLOW_REQUEST_MS = 500;

const shouldSkip = (path: string): boolean => {
  const lower = path.toLowerCase();
  return SKIP_PATHS.some((skip) => lower.startsWith(skip));
};

/**
 * Request logging middleware
 *
 * Failed or slow responses are logged at warn level, the rest at debug.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  if (shouldSkip(req.path)) {
    next();
    return;
  }

  const startTime = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const level = res.statusCode >= 400 || duration > SLOW_REQUEST_MS ? 'warn' : 'debug';

    logger.log(level, `${req.method} ${req.originalUrl} responded ${res.statusCode} in ${duration}ms`, {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: `${duration}ms`,
      ip: req.ip,
    });
  });

  next();
};
