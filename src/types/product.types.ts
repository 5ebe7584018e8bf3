/**
 * Product domain types
 */

import { Patch } from './api.types';

export interface Product {
  id: number;
  name: string;
  description: string;
  price: number;
  stock: number;
  categoryId: number;
  categoryName: string;
  createdAt: Date;
  updatedAt: Date;
}

// Database row type (snake_case from PostgreSQL)
export interface ProductRow {
  id: number;
  name: string;
  description: string;
  price: number | string;
  stock: number;
  category_id: number;
  created_at: string;
  updated_at: string;
  categories?: { name: string } | null;
}

export interface CreateProductInput {
  name: string;
  description: string;
  price: number;
  stock: number;
  categoryId: number;
}

export type ProductPatch = Patch<CreateProductInput>;

// Columns written by a product update; absent ones keep their stored value
export type ProductChanges = Partial<CreateProductInput>;
