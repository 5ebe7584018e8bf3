import { Request, Response, NextFunction } from 'express';
import { AppError, ErrorCode } from '../types/error.types';
import { createErrorResponse } from '../utils/response-factory';
import { logger } from '../config/logger';
import { env } from '../config/environment';
import { ZodError } from 'zod';
import { validationFailure } from './validation.middleware';

// body-parser marks malformed JSON with this type
const isBodyParseError = (err: Error): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

/**
 * Global error handling middleware
 *
 * Client errors are expected outcomes and only show up at debug level.
 * Anything else is logged once here and answered with a generic 500.
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof AppError && err.isClientError) {
    logger.debug('Request rejected', {
      code: err.code,
      error: err.message,
      path: req.path,
      method: req.method,
    });
    return res.status(err.statusCode).json(createErrorResponse(err.code, err.message, err.details));
  }

  if (err instanceof ZodError) {
    logger.debug('Request validation failed', { path: req.path, method: req.method });
    return res.status(400).json(validationFailure(err));
  }

  if (isBodyParseError(err)) {
    logger.debug('Malformed JSON body', { path: req.path, method: req.method });
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON'));
  }

  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  const message =
    env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred';

  return res.status(500).json(createErrorResponse(ErrorCode.INTERNAL_ERROR, message));
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .json(createErrorResponse(ErrorCode.NOT_FOUND, `Route ${req.method} ${req.path} not found`));
};
