import { z } from 'zod';
import { byIdSchema, idField, idParam, paginationQuery } from './common.validator';
import { hasAtMostTwoDecimals } from '../utils/money';

/**
 * Product validation schemas
 */

// products.stock is a PostgreSQL INTEGER
const MAX_STOCK = 2147483647;

const price = z
  .number({
    required_error: 'Price is required',
    invalid_type_error: 'Price must be a number',
  })
  .positive('Price must be positive')
  .refine(hasAtMostTwoDecimals, 'Price must have at most two decimal places');

const stock = z
  .number({
    required_error: 'Stock is required',
    invalid_type_error: 'Stock must be a number',
  })
  .int('Stock must be an integer')
  .nonnegative('Stock cannot be negative')
  .max(MAX_STOCK, `Stock cannot exceed ${MAX_STOCK}`);

const categoryId = idField('Category');

export const createProductSchema = z.object({
  body: z.object({
    name: z.string().trim().min(1, 'Name is required').max(200, 'Name must be at most 200 characters'),
    description: z.string().max(1000, 'Description must be at most 1000 characters').default(''),
    price,
    stock,
    categoryId,
  }),
});

export const updateProductSchema = z.object({
  params: z.object({
    id: idParam('product'),
  }),
  body: z.object({
    name: z.string().trim().min(1, 'Name cannot be empty').max(200).nullish(),
    description: z.string().max(1000).nullish(),
    price: price.nullish(),
    stock: stock.nullish(),
    categoryId: categoryId.nullish(),
  }),
});

export const getProductSchema = byIdSchema('product');

export const listProductsPageSchema = z.object({
  query: paginationQuery,
});

export const productsByCategorySchema = z.object({
  params: z.object({
    categoryId: idParam('category'),
  }),
});

export const searchProductsSchema = z.object({
  query: paginationQuery.extend({
    name: z.string().optional(),
  }),
});

export type CreateProductBody = z.infer<typeof createProductSchema>['body'];
export type UpdateProductBody = z.infer<typeof updateProductSchema>['body'];
