import { z } from 'zod';
import { byIdSchema, idParam } from './common.validator';
import { UserRole } from '../types/user.types';
import { MIN_PASSWORD_LENGTH } from '../utils/password';

/**
 * User and auth validation schemas
 */

const phone = z
  .string()
  .max(20, 'Phone must be at most 20 characters')
  .regex(/^[0-9+()\-\s]*$/, 'Invalid phone number');

// New accounts are always customers; admins change roles through /api/users
export const registerSchema = z.object({
  body: z.object({
    firstName: z.string().trim().min(1, 'First name is required').max(100),
    lastName: z.string().trim().min(1, 'Last name is required').max(100),
    email: z.string().trim().email('Invalid email address').max(200),
    password: z
      .string({ required_error: 'Password is required' })
      .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`),
    phone: phone.optional(),
    address: z.string().max(500).optional(),
  }),
});

// Blank credentials are answered by the controller with its own message
export const loginSchema = z.object({
  body: z.object({
    email: z.string().optional(),
    password: z.string().optional(),
  }),
});

export const updateUserSchema = z.object({
  params: z.object({
    id: idParam('user'),
  }),
  body: z.object({
    firstName: z.string().trim().min(1).max(100).nullish(),
    lastName: z.string().trim().min(1).max(100).nullish(),
    email: z.string().trim().email('Invalid email address').max(200).nullish(),
    phone: phone.nullish(),
    address: z.string().max(500).nullish(),
    role: z.nativeEnum(UserRole).nullish(),
  }),
});

export const getUserSchema = byIdSchema('user');

export type RegisterBody = z.infer<typeof registerSchema>['body'];
export type UpdateUserBody = z.infer<typeof updateUserSchema>['body'];
