import { SupabaseClient } from '@supabase/supabase-js';
import { Product, ProductRow, CreateProductInput, ProductChanges } from '../types/product.types';
import { Page, PaginationParams } from '../types/api.types';
import { databaseError, escapeLikePattern, NO_ROWS, RANGE_NOT_SATISFIABLE } from './supabase-errors';
import { pageRange } from '../utils/pagination';
import { parseMoney } from '../utils/money';
import { logger } from '../config/logger';

export interface ProductRepository {
  findAll(): Promise<Product[]>;
  findPage(params: PaginationParams): Promise<Page<Product>>;
  findById(id: number): Promise<Product | null>;
  findByCategory(categoryId: number): Promise<Product[]>;
  searchByName(term: string): Promise<Product[]>;
  searchByNamePage(term: string, params: PaginationParams): Promise<Page<Product>>;
  create(input: CreateProductInput): Promise<Product>;
  update(id: number, changes: ProductChanges): Promise<Product | null>;
  delete(id: number): Promise<boolean>;
}

// Category name comes from the embedded relation
const PRODUCT_SELECT = '*, categories(name)';

/**
 * Product Repository
 *
 * Handles all database operations for products table. Stock is only ever
 * decremented by the create_order_atomic function, never from here.
 */
export class SupabaseProductRepository implements ProductRepository {
  constructor(private client: SupabaseClient) {}

  async findAll(): Promise<Product[]> {
    const { data, error } = await this.client
      .from('products')
      .select(PRODUCT_SELECT)
      .order('id')
      .returns<ProductRow[]>();

    if (error) throw databaseError('list products', error);

    return (data ?? []).map((row) => this.mapToProduct(row));
  }

  async findPage(params: PaginationParams): Promise<Page<Product>> {
    const { from, to } = pageRange(params);

    const { data, count, error } = await this.client
      .from('products')
      .select(PRODUCT_SELECT, { count: 'exact' })
      .order('id')
      .range(from, to)
      .returns<ProductRow[]>();

    if (error) {
      if (error.code === RANGE_NOT_SATISFIABLE) return { items: [], totalCount: await this.count() };
      throw databaseError('list products page', error, { ...params });
    }

    return {
      items: (data ?? []).map((row) => this.mapToProduct(row)),
      totalCount: count ?? 0,
    };
  }

  async findById(id: number): Promise<Product | null> {
    const { data, error } = await this.client
      .from('products')
      .select(PRODUCT_SELECT)
      .eq('id', id)
      .returns<ProductRow[]>()
      .single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      throw databaseError('find product', error, { id });
    }

    return data ? this.mapToProduct(data) : null;
  }

  async findByCategory(categoryId: number): Promise<Product[]> {
    const { data, error } = await this.client
      .from('products')
      .select(PRODUCT_SELECT)
      .eq('category_id', categoryId)
      .order('id')
      .returns<ProductRow[]>();

    if (error) throw databaseError('list products by category', error, { categoryId });

    return (data ?? []).map((row) => this.mapToProduct(row));
  }

  async searchByName(term: string): Promise<Product[]> {
    const { data, error } = await this.client
      .from('products')
      .select(PRODUCT_SELECT)
      .ilike('name', `%${escapeLikePattern(term)}%`)
      .order('id')
      .returns<ProductRow[]>();

    if (error) throw databaseError('search products', error, { term });

    return (data ?? []).map((row) => this.mapToProduct(row));
  }

  async searchByNamePage(term: string, params: PaginationParams): Promise<Page<Product>> {
    const { from, to } = pageRange(params);

    const { data, count, error } = await this.client
      .from('products')
      .select(PRODUCT_SELECT, { count: 'exact' })
      .ilike('name', `%${escapeLikePattern(term)}%`)
      .order('id')
      .range(from, to)
      .returns<ProductRow[]>();

    if (error) {
      if (error.code === RANGE_NOT_SATISFIABLE) return { items: [], totalCount: await this.count(term) };
      throw databaseError('search products page', error, { term, ...params });
    }

    return {
      items: (data ?? []).map((row) => this.mapToProduct(row)),
      totalCount: count ?? 0,
    };
  }

  async create(input: CreateProductInput): Promise<Product> {
    logger.debug('Inserting product', { name: input.name, categoryId: input.categoryId });

    const { data, error } = await this.client
      .from('products')
      .insert({
        name: input.name,
        description: input.description,
        price: input.price,
        stock: input.stock,
        category_id: input.categoryId,
      })
      .select(PRODUCT_SELECT)
      .returns<ProductRow[]>()
      .single();

    if (error) throw databaseError('create product', error);

    return this.mapToProduct(data);
  }

  async update(id: number, changes: ProductChanges): Promise<Product | null> {
    const { data, error } = await this.client
      .from('products')
      .update({
        ...(changes.name !== undefined ? { name: changes.name } : {}),
        ...(changes.description !== undefined ? { description: changes.description } : {}),
        ...(changes.price !== undefined ? { price: changes.price } : {}),
        ...(changes.stock !== undefined ? { stock: changes.stock } : {}),
        ...(changes.categoryId !== undefined ? { category_id: changes.categoryId } : {}),
        updated_at: new Date().toISOString(),
      })
      .eq('id', id)
      .select(PRODUCT_SELECT)
      .returns<ProductRow[]>()
      .single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      throw databaseError('update product', error, { id });
    }

    return this.mapToProduct(data);
  }

  async delete(id: number): Promise<boolean> {
    const { data, error } = await this.client.from('products').delete().eq('id', id).select('id');

    if (error) throw databaseError('delete product', error, { id });

    return (data ?? []).length > 0;
  }

  /**
   * Row count for a page that starts past the end, where PostgREST answers
   * 416 without a count
   */
  private async count(term?: string): Promise<number> {
    let query = this.client.from('products').select('id', { count: 'exact', head: true });
    if (term !== undefined) {
      query = query.ilike('name', `%${escapeLikePattern(term)}%`);
    }

    const { count, error } = await query;

    if (error) throw databaseError('count products', error, { term });

    return count ?? 0;
  }

  /**
   * Map database row to domain model
   */
  private mapToProduct(row: ProductRow): Product {
    return {
      id: row.id,
      name: row.name,
      description: row.description,
      price: parseMoney(row.price),
      stock: row.stock,
      categoryId: row.category_id,
      categoryName: row.categories?.name ?? '',
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}
