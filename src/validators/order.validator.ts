import { z } from 'zod';
import { byIdSchema, idField, idParam } from './common.validator';

/**
 * Order validation schemas
 */

const orderItemSchema = z.object({
  productId: idField('Product'),
  quantity: z
    .number({
      required_error: 'Quantity is required',
      invalid_type_error: 'Quantity must be a number',
    })
    .int('Quantity must be an integer')
    .min(1, 'Quantity must be at least 1'),
});

export const createOrderSchema = z.object({
  body: z.object({
    userId: idField('User'),
    shippingAddress: z
      .string({ required_error: 'Shipping address is required' })
      .trim()
      .min(1, 'Shipping address is required')
      .max(500, 'Shipping address must be at most 500 characters'),
    orderItems: z
      .array(orderItemSchema, { required_error: 'Order items are required' })
      .min(1, 'Order must contain at least one item'),
  }),
});

// Status stays a plain string here; the order service names the allowed set
export const updateOrderSchema = z.object({
  params: z.object({
    id: idParam('order'),
  }),
  body: z.object({
    shippingAddress: z
      .string()
      .trim()
      .min(1, 'Shipping address cannot be empty')
      .max(500, 'Shipping address must be at most 500 characters')
      .nullish(),
    status: z.string().nullish(),
  }),
});

export const getOrderSchema = byIdSchema('order');

export const ordersByUserSchema = z.object({
  params: z.object({
    userId: idParam('user'),
  }),
});

export type CreateOrderBody = z.infer<typeof createOrderSchema>['body'];
export type UpdateOrderBody = z.infer<typeof updateOrderSchema>['body'];
