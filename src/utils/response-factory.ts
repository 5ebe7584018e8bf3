import { ApiErrorResponse } from '../types/api.types';

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    message,
    code,
    ...(details && { details }),
  };
}

export function notFoundResponse(code: string, entity: string, id: number): ApiErrorResponse {
  return createErrorResponse(code, `${entity} with ID ${id} not found.`);
}
