import { Request, Response, NextFunction, RequestHandler } from 'express';
import { createErrorResponse } from '../utils/response-factory';
import { ErrorCode } from '../types/error.types';
import { componentLogger } from '../config/logger';

const logger = componentLogger('rate-limit');

export interface RateLimitOptions {
  enabled: boolean;
  windowMs: number;
  max: number;
  now?: () => number;
}

interface Window {
  startedAt: number;
  count: number;
}

/**
 * Fixed-window request limiter keyed by client IP.
 *
 * When disabled it is a pass-through and keeps no state.
 */
export const createRateLimiter = (options: RateLimitOptions): RequestHandler => {
  if (!options.enabled) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const now = options.now ?? Date.now;
  const windows = new Map<string, Window>();

  return (req: Request, res: Response, next: NextFunction) => {
    const key = req.ip ?? 'unknown';
    const current = now();

    let window = windows.get(key);
    if (!window || current - window.startedAt >= options.windowMs) {
      // drop stale windows so the map does not grow with every client seen
      for (const [client, entry] of windows) {
        if (current - entry.startedAt >= options.windowMs) windows.delete(client);
      }
      window = { startedAt: current, count: 0 };
      windows.set(key, window);
    }

    window.count++;
    res.setHeader('X-RateLimit-Limit', String(options.max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, options.max - window.count)));

    if (window.count > options.max) {
      const retryAfterSeconds = Math.ceil((window.startedAt + options.windowMs - current) / 1000);
      logger.warn('Rate limit exceeded', { ip: key, path: req.path });
      res.setHeader('Retry-After', String(retryAfterSeconds));
      res
        .status(429)
        .json(createErrorResponse(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later.'));
      return;
    }

    next();
  };
};
