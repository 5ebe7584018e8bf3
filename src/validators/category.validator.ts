import { z } from 'zod';
import { byIdSchema, idParam } from './common.validator';

/**
 * Category validation schemas
 */

export const createCategorySchema = z.object({
  body: z.object({
    name: z.string().trim().min(1, 'Name is required').max(100, 'Name must be at most 100 characters'),
    description: z.string().max(500, 'Description must be at most 500 characters').default(''),
  }),
});

export const updateCategorySchema = z.object({
  params: z.object({
    id: idParam('category'),
  }),
  body: z.object({
    name: z.string().trim().min(1, 'Name cannot be empty').max(100).nullish(),
    description: z.string().max(500).nullish(),
  }),
});

export const getCategorySchema = byIdSchema('category');

export type CreateCategoryBody = z.infer<typeof createCategorySchema>['body'];
export type UpdateCategoryBody = z.infer<typeof updateCategorySchema>['body'];
