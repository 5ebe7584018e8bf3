import { SupabaseClient } from '@supabase/supabase-js';
import { CategoryRepository, SupabaseCategoryRepository } from './category.repository';
import { ProductRepository, SupabaseProductRepository } from './product.repository';
import { UserRepository, SupabaseUserRepository } from './user.repository';
import { SessionRepository, SupabaseSessionRepository } from './session.repository';
import { OrderRepository, SupabaseOrderRepository } from './order.repository';

export interface Repositories {
  categories: CategoryRepository;
  products: ProductRepository;
  users: UserRepository;
  sessions: SessionRepository;
  orders: OrderRepository;
}

export function createSupabaseRepositories(client: SupabaseClient): Repositories {
  return {
    categories: new SupabaseCategoryRepository(client),
    products: new SupabaseProductRepository(client),
    users: new SupabaseUserRepository(client),
    sessions: new SupabaseSessionRepository(client),
    orders: new SupabaseOrderRepository(client),
  };
}

export type { CategoryRepository, ProductRepository, UserRepository, SessionRepository, OrderRepository };
