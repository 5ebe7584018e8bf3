import { AppError, ErrorCode } from '../types/error.types';
import { componentLogger } from '../config/logger';

const logger = componentLogger('database');

/**
 * Error shape returned by PostgREST through supabase-js
 */
export interface PostgrestErrorLike {
  message: string;
  code: string;
  details?: string | null;
  hint?: string | null;
}

// PostgREST: no (or more than one) row for .single()
export const NO_ROWS = 'PGRST116';

// PostgREST: offset past the last row of a counted range
export const RANGE_NOT_SATISFIABLE = 'PGRST103';

// PostgreSQL: foreign key violation
export const FOREIGN_KEY_VIOLATION = '23503';

// PostgreSQL: unique constraint violation
export const UNIQUE_VIOLATION = '23505';

/**
 * Log and wrap a database error. Foreign key violations on delete surface as
 * conflicts because the row is still referenced.
 */
export function databaseError(action: string, error: PostgrestErrorLike, context?: Record<string, unknown>): Error {
  if (error.code === FOREIGN_KEY_VIOLATION) {
    return new AppError(
      ErrorCode.RESOURCE_IN_USE,
      `Cannot ${action}: the record is still referenced by other records.`,
      409
    );
  }

  logger.error(`Failed to ${action}`, {
    ...context,
    error: error.message,
    code: error.code,
    details: error.details,
    hint: error.hint,
  });
  return new Error(`Failed to ${action}: ${error.message}`);
}

/**
 * Escape LIKE wildcards so a search term matches literally
 */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`);
}
