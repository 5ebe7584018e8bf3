import { createInMemoryRepositories, StoreState } from './in-memory-repositories';
import { Repositories } from '../../src/repositories';
import { createServices, Services } from '../../src/services';
import { Product } from '../../src/types/product.types';
import { User, UserRole } from '../../src/types/user.types';
import { hashPassword } from '../../src/utils/password';

export const TEST_PASSWORD = 'test-secret';

export interface StoreFixture {
  state: StoreState;
  repos: Repositories;
  services: Services;
  customer: User;
  categoryId: number;
  lamp: Product;
  shelf: Product;
}

/**
 * Fresh store with one customer, one category and two products:
 * Desk Lamp ($10.00, 10 in stock) and Bookshelf ($25.00, 5 in stock).
 */
export async function createStore(): Promise<StoreFixture> {
  const state = new StoreState();
  const repos = createInMemoryRepositories(state);
  const services = createServices(repos);

  const customer = await addUser(repos, UserRole.CUSTOMER, 'customer@example.test');
  const category = await repos.categories.create({ name: 'Furniture', description: 'Home office' });
  const lamp = await repos.products.create({
    name: 'Desk Lamp',
    description: 'LED lamp',
    price: 10,
    stock: 10,
    categoryId: category.id,
  });
  const shelf = await repos.products.create({
    name: 'Bookshelf',
    description: 'Five shelves',
    price: 25,
    stock: 5,
    categoryId: category.id,
  });

  return { state, repos, services, customer, categoryId: category.id, lamp, shelf };
}

export async function addUser(repos: Repositories, role: UserRole, email: string): Promise<User> {
  return repos.users.create({
    firstName: 'Test',
    lastName: role,
    email,
    passwordHash: await hashPassword(TEST_PASSWORD, 4),
    phone: '',
    address: '1 Test Street',
    role,
  });
}

export async function stockOf(repos: Repositories, productId: number): Promise<number | undefined> {
  return (await repos.products.findById(productId))?.stock;
}
