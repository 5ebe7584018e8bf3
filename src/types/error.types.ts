/**
 * Error types and codes
 */

export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_REFERENCE = 'INVALID_REFERENCE',
  INSUFFICIENT_STOCK = 'INSUFFICIENT_STOCK',
  INVALID_STATUS = 'INVALID_STATUS',
  DUPLICATE_EMAIL = 'DUPLICATE_EMAIL',

  // Authentication / authorization (401, 403)
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',

  // Not found (404), produced by controllers from absent results
  NOT_FOUND = 'NOT_FOUND',
  PRODUCT_NOT_FOUND = 'PRODUCT_NOT_FOUND',
  CATEGORY_NOT_FOUND = 'CATEGORY_NOT_FOUND',
  ORDER_NOT_FOUND = 'ORDER_NOT_FOUND',
  USER_NOT_FOUND = 'USER_NOT_FOUND',

  // Conflict errors (409)
  INVALID_STATUS_TRANSITION = 'INVALID_STATUS_TRANSITION',
  RESOURCE_IN_USE = 'RESOURCE_IN_USE',

  // Throttling (429)
  RATE_LIMITED = 'RATE_LIMITED',

  // Server errors (500)
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// Custom application error class
export class AppError extends Error {
  constructor(
    public code: ErrorCode | string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /** Client errors are expected outcomes and are not logged as failures */
  get isClientError(): boolean {
    return this.statusCode < 500;
  }
}

export const validationError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): AppError => new AppError(code, message, 400, details);
