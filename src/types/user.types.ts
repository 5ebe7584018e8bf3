/**
 * User domain types
 */

import { Patch } from './api.types';

export enum UserRole {
  CUSTOMER = 'Customer',
  MANAGER = 'Manager',
  ADMIN = 'Admin',
}

export const USER_ROLES: readonly UserRole[] = Object.values(UserRole);

export interface User {
  id: number;
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  address: string;
  role: UserRole;
  createdAt: Date;
  updatedAt: Date;
}

// Internal only: never leaves the service layer
export interface UserWithCredentials extends User {
  passwordHash: string;
}

// Database row type (snake_case from PostgreSQL)
export interface UserRow {
  id: number;
  first_name: string;
  last_name: string;
  email: string;
  password_hash: string;
  phone: string;
  address: string;
  role: string;
  created_at: string;
  updated_at: string;
}

export interface CreateUserInput {
  firstName: string;
  lastName: string;
  email: string;
  password: string;
  phone?: string;
  address?: string;
  role?: UserRole;
}

// Persisted shape of a new user
export interface CreateUserParams {
  firstName: string;
  lastName: string;
  email: string;
  passwordHash: string;
  phone: string;
  address: string;
  role: UserRole;
}

export type UserPatch = Patch<{
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  address: string;
  role: UserRole;
}>;

export type UserChanges = Omit<CreateUserParams, 'passwordHash'>;

export const parseUserRole = (value: string): UserRole | null =>
  USER_ROLES.find((role) => role === value) ?? null;
