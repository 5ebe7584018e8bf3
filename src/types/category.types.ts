/**
 * Category domain types
 */

import { Patch } from './api.types';

export interface Category {
  id: number;
  name: string;
  description: string;
  productCount: number;
  createdAt: Date;
  updatedAt: Date;
}

// Database row type (snake_case from PostgreSQL), with the embedded product count
export interface CategoryRow {
  id: number;
  name: string;
  description: string;
  created_at: string;
  updated_at: string;
  products?: Array<{ count: number }> | null;
}

export interface CreateCategoryInput {
  name: string;
  description: string;
}

export type CategoryPatch = Patch<CreateCategoryInput>;
