import { SupabaseClient } from '@supabase/supabase-js';
import {
  CreateUserParams,
  User,
  UserChanges,
  UserRole,
  UserRow,
  UserWithCredentials,
  parseUserRole,
} from '../types/user.types';
import { databaseError, NO_ROWS, UNIQUE_VIOLATION } from './supabase-errors';
import { AppError, ErrorCode, validationError } from '../types/error.types';
import { logger } from '../config/logger';

export interface UserRepository {
  findAll(): Promise<User[]>;
  findById(id: number): Promise<User | null>;
  findByEmail(email: string): Promise<UserWithCredentials | null>;
  exists(id: number): Promise<boolean>;
  create(params: CreateUserParams): Promise<User>;
  update(id: number, changes: UserChanges): Promise<User | null>;
  delete(id: number): Promise<boolean>;
}

/**
 * User Repository
 *
 * Handles all database operations for users table. Emails are stored
 * lower-cased; the unique index lives on that column.
 */
export class SupabaseUserRepository implements UserRepository {
  constructor(private client: SupabaseClient) {}

  async findAll(): Promise<User[]> {
    const { data, error } = await this.client.from('users').select('*').order('id');

    if (error) throw databaseError('list users', error);

    return (data ?? []).map((row) => this.mapToUser(row));
  }

  async findById(id: number): Promise<User | null> {
    const { data, error } = await this.client.from('users').select('*').eq('id', id).single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      throw databaseError('find user', error, { id });
    }

    return data ? this.mapToUser(data) : null;
  }

  async findByEmail(email: string): Promise<UserWithCredentials | null> {
    const { data, error } = await this.client
      .from('users')
      .select('*')
      .eq('email', email.toLowerCase())
      .single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      throw databaseError('find user by email', error);
    }

    return data ? { ...this.mapToUser(data), passwordHash: data.password_hash } : null;
  }

  async exists(id: number): Promise<boolean> {
    const { count, error } = await this.client
      .from('users')
      .select('id', { count: 'exact', head: true })
      .eq('id', id);

    if (error) throw databaseError('check user', error, { id });

    return (count ?? 0) > 0;
  }

  async create(params: CreateUserParams): Promise<User> {
    logger.debug('Inserting user', { role: params.role });

    const { data, error } = await this.client
      .from('users')
      .insert({
        first_name: params.firstName,
        last_name: params.lastName,
        email: params.email.toLowerCase(),
        password_hash: params.passwordHash,
        phone: params.phone,
        address: params.address,
        role: params.role,
      })
      .select('*')
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) throw this.emailTaken(params.email);
      throw databaseError('create user', error);
    }

    return this.mapToUser(data);
  }

  async update(id: number, changes: UserChanges): Promise<User | null> {
    const { data, error } = await this.client
      .from('users')
      .update({
        first_name: changes.firstName,
        last_name: changes.lastName,
        email: changes.email.toLowerCase(),
        phone: changes.phone,
        address: changes.address,
        role: changes.role,
        updated_at: new Date().toISOString(),
      })
      .eq('id', id)
      .select('*')
      .single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      if (error.code === UNIQUE_VIOLATION) throw this.emailTaken(changes.email);
      throw databaseError('update user', error, { id });
    }

    return this.mapToUser(data);
  }

  async delete(id: number): Promise<boolean> {
    const { data, error } = await this.client.from('users').delete().eq('id', id).select('id');

    if (error) throw databaseError('delete user', error, { id });

    return (data ?? []).length > 0;
  }

  // The only unique column is the email; a concurrent registration lost the race
  private emailTaken(email: string): AppError {
    return validationError(ErrorCode.DUPLICATE_EMAIL, `User with email ${email} already exists.`, {
      email,
    });
  }

  /**
   * Map database row to domain model, leaving the password hash behind
   */
  private mapToUser(row: UserRow): User {
    return {
      id: row.id,
      firstName: row.first_name,
      lastName: row.last_name,
      email: row.email,
      phone: row.phone,
      address: row.address,
      role: parseUserRole(row.role) ?? UserRole.CUSTOMER,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
