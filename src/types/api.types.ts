/**
 * API request and response types
 */

// Error response body
export interface ApiErrorResponse {
  message: string;
  code: string;
  details?: Record<string, unknown>;
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
}

// Page request, 1-based
export interface PaginationParams {
  pageNumber: number;
  pageSize: number;
}

// One page of results plus totals
export interface PagedResult<T> {
  items: T[];
  pageNumber: number;
  pageSize: number;
  totalCount: number;
  totalPages: number;
}

// Repository-level page: rows plus the unpaged count
export interface Page<T> {
  items: T[];
  totalCount: number;
}

/**
 * Partial update: absent or null fields leave the target untouched
 */
export type Patch<T> = { [K in keyof T]?: T[K] | null };
