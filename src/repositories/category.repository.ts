import { SupabaseClient } from '@supabase/supabase-js';
import { Category, CategoryRow, CreateCategoryInput } from '../types/category.types';
import { databaseError, NO_ROWS } from './supabase-errors';
import { logger } from '../config/logger';

export interface CategoryRepository {
  findAll(): Promise<Category[]>;
  findById(id: number): Promise<Category | null>;
  exists(id: number): Promise<boolean>;
  create(input: CreateCategoryInput): Promise<Category>;
  update(id: number, changes: CreateCategoryInput): Promise<Category | null>;
  delete(id: number): Promise<boolean>;
}

const CATEGORY_SELECT = '*, products(count)';

/**
 * Category Repository
 *
 * Handles all database operations for categories table
 */
export class SupabaseCategoryRepository implements CategoryRepository {
  constructor(private client: SupabaseClient) {}

  async findAll(): Promise<Category[]> {
    const { data, error } = await this.client
      .from('categories')
      .select(CATEGORY_SELECT)
      .order('id')
      .returns<CategoryRow[]>();

    if (error) throw databaseError('list categories', error);

    return (data ?? []).map((row) => this.mapToCategory(row));
  }

  async findById(id: number): Promise<Category | null> {
    const { data, error } = await this.client
      .from('categories')
      .select(CATEGORY_SELECT)
      .eq('id', id)
      .returns<CategoryRow[]>()
      .single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      throw databaseError('find category', error, { id });
    }

    return data ? this.mapToCategory(data) : null;
  }

  async exists(id: number): Promise<boolean> {
    const { count, error } = await this.client
      .from('categories')
      .select('id', { count: 'exact', head: true })
      .eq('id', id);

    if (error) throw databaseError('check category', error, { id });

    return (count ?? 0) > 0;
  }

  async create(input: CreateCategoryInput): Promise<Category> {
    logger.debug('Inserting category', { name: input.name });

    const { data, error } = await this.client
      .from('categories')
      .insert({ name: input.name, description: input.description })
      .select(CATEGORY_SELECT)
      .returns<CategoryRow[]>()
      .single();

    if (error) throw databaseError('create category', error);

    return this.mapToCategory(data);
  }

  async update(id: number, changes: CreateCategoryInput): Promise<Category | null> {
    const { data, error } = await this.client
      .from('categories')
      .update({
        name: changes.name,
        description: changes.description,
        updated_at: new Date().toISOString(),
      })
      .eq('id', id)
      .select(CATEGORY_SELECT)
      .returns<CategoryRow[]>()
      .single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      throw databaseError('update category', error, { id });
    }

    return this.mapToCategory(data);
  }

  async delete(id: number): Promise<boolean> {
    const { data, error } = await this.client.from('categories').delete().eq('id', id).select('id');

    if (error) throw databaseError('delete category', error, { id });

    return (data ?? []).length > 0;
  }

  private mapToCategory(row: CategoryRow): Category {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      productCount: row.products?.[0]?.count ?? 0,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
