import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createStore, stockOf, StoreFixture } from '../support/fixtures';
import { AppError, ErrorCode } from '../../src/types/error.types';

describe('ProductService', () => {
  let store: StoreFixture;

  beforeEach(async () => {
    store = await createStore();
  });

  it('lists products with their category name', async () => {
    const products = await store.services.productService.getAllProducts();

    expect(products.map((product) => [product.name, product.categoryName])).toEqual([
      ['Desk Lamp', 'Furniture'],
      ['Bookshelf', 'Furniture'],
    ]);
  });

  it('pages through products', async () => {
    const page = await store.services.productService.getProductsPage({ pageNumber: 2, pageSize: 1 });

    expect(page.items.map((product) => product.name)).toEqual(['Bookshelf']);
    expect(page).toMatchObject({ pageNumber: 2, pageSize: 1, totalCount: 2, totalPages: 2 });
  });

  it('lists products of one category', async () => {
    const other = await store.repos.categories.create({ name: 'Lighting', description: '' });
    await store.repos.products.create({
      name: 'Floor Lamp',
      description: '',
      price: 40,
      stock: 3,
      categoryId: other.id,
    });

    const products = await store.services.productService.getProductsByCategory(other.id);
    expect(products.map((product) => product.name)).toEqual(['Floor Lamp']);
  });

  describe('search', () => {
    it('matches a substring regardless of case', async () => {
      const products = await store.services.productService.searchProductsByName('LAMP');
      expect(products.map((product) => product.name)).toEqual(['Desk Lamp']);
    });

    it('returns nothing for a blank term', async () => {
      expect(await store.services.productService.searchProductsByName('   ')).toEqual([]);
    });

    it('treats wildcard characters literally', async () => {
      expect(await store.services.productService.searchProductsByName('%')).toEqual([]);
    });

    it('returns an empty page for a blank term', async () => {
      const page = await store.services.productService.searchProductsByNamePage('', {
        pageNumber: 1,
        pageSize: 10,
      });

      expect(page).toEqual({ items: [], pageNumber: 1, pageSize: 10, totalCount: 0, totalPages: 0 });
    });

    it('pages search results', async () => {
      const page = await store.services.productService.searchProductsByNamePage('o', {
        pageNumber: 1,
        pageSize: 1,
      });

      expect(page.items.map((product) => product.name)).toEqual(['Bookshelf']);
      expect(page.totalCount).toBe(1);
    });
  });

  describe('createProduct', () => {
    it('creates a product in an existing category', async () => {
      const product = await store.services.productService.createProduct({
        name: 'Office Chair',
        description: 'Mesh back',
        price: 89.5,
        stock: 7,
        categoryId: store.categoryId,
      });

      expect(product).toMatchObject({ id: 3, name: 'Office Chair', categoryName: 'Furniture' });
    });

    it('rejects an unknown category', async () => {
      await expect(
        store.services.productService.createProduct({
          name: 'Office Chair',
          description: '',
          price: 89.5,
          stock: 7,
          categoryId: 99,
        })
      ).rejects.toMatchObject({
        code: ErrorCode.INVALID_REFERENCE,
        message: 'Category with ID 99 does not exist.',
      });
    });
  });

  describe('updateProduct', () => {
    it('changes only the fields given', async () => {
      const updated = await store.services.productService.updateProduct(store.lamp.id, {
        price: 12,
        name: null,
      });

      expect(updated).toMatchObject({ name: 'Desk Lamp', price: 12, stock: 10 });
    });

    it('keeps the stock taken by an order placed while the update is in flight', async () => {
      const { services, repos, customer, lamp } = store;
      const findById = repos.products.findById.bind(repos.products);

      vi.spyOn(repos.products, 'findById').mockImplementationOnce(async (id) => {
        const snapshot = await findById(id);
        await services.orderService.createOrder({
          userId: customer.id,
          shippingAddress: '1 Test Street',
          items: [{ productId: lamp.id, quantity: 3 }],
        });
        return snapshot;
      });

      const updated = await services.productService.updateProduct(lamp.id, { price: 12 });

      expect(updated).toMatchObject({ price: 12, stock: 7 });
      expect(await stockOf(repos, lamp.id)).toBe(7);
    });

    it('rejects a move to an unknown category', async () => {
      await expect(
        store.services.productService.updateProduct(store.lamp.id, { categoryId: 42 })
      ).rejects.toMatchObject({ message: 'Category with ID 42 does not exist.' });
    });

    it('returns null for a missing product', async () => {
      expect(await store.services.productService.updateProduct(999, { price: 1 })).toBeNull();
    });
  });

  describe('deleteProduct', () => {
    it('deletes an unreferenced product', async () => {
      expect(await store.services.productService.deleteProduct(store.lamp.id)).toBe(true);
      expect(await store.services.productService.getProductById(store.lamp.id)).toBeNull();
    });

    it('reports a missing product', async () => {
      expect(await store.services.productService.deleteProduct(999)).toBe(false);
    });

    it('refuses to delete a product that was ordered', async () => {
      await store.services.orderService.createOrder({
        userId: store.customer.id,
        shippingAddress: '1 Test Street',
        items: [{ productId: store.lamp.id, quantity: 1 }],
      });

      const attempt = store.services.productService.deleteProduct(store.lamp.id);

      await expect(attempt).rejects.toBeInstanceOf(AppError);
      await expect(attempt).rejects.toMatchObject({
        code: ErrorCode.RESOURCE_IN_USE,
        statusCode: 409,
        message: 'Cannot delete product: the record is still referenced by other records.',
      });
    });
  });
});
