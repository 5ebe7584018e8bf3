import { z } from 'zod';
import { MAX_PAGE_SIZE } from '../utils/pagination';

/**
 * Shared validation pieces
 */

// Route ids arrive as strings; past the safe integer range they cannot name a row
export const idParam = (label: string) =>
  z
    .string()
    .regex(/^\d+$/, `Invalid ${label} ID format`)
    .refine((value) => {
      const id = Number(value);
      return id > 0 && Number.isSafeInteger(id);
    }, `Invalid ${label} ID format`);

// Ids in request bodies
export const idField = (label: string) =>
  z
    .number({
      required_error: `${label} ID is required`,
      invalid_type_error: `${label} ID must be a number`,
    })
    .int(`${label} ID must be an integer`)
    .positive(`${label} ID must be positive`)
    .max(Number.MAX_SAFE_INTEGER, `${label} ID is out of range`);

const pageNumber = z
  .string()
  .regex(/^\d+$/, 'pageNumber must be a positive integer')
  .refine((value) => Number(value) >= 1, 'pageNumber must be at least 1')
  .refine(
    (value) => Number.isSafeInteger(Number(value) * MAX_PAGE_SIZE),
    'pageNumber is out of range'
  );

const pageSize = z
  .string()
  .regex(/^\d+$/, 'pageSize must be a positive integer')
  .refine(
    (value) => Number(value) >= 1 && Number(value) <= MAX_PAGE_SIZE,
    `pageSize must be between 1 and ${MAX_PAGE_SIZE}`
  );

export const paginationQuery = z.object({
  pageNumber: pageNumber.optional(),
  pageSize: pageSize.optional(),
});

export const byIdSchema = (label: string) =>
  z.object({
    params: z.object({
      id: idParam(label),
    }),
  });
