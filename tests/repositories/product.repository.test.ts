import { describe, it, expect } from 'vitest';
import { SupabaseProductRepository } from '../../src/repositories/product.repository';
import { SupabaseCategoryRepository } from '../../src/repositories/category.repository';
import { ProductService } from '../../src/services/product.service';
import { postgrestError, StubbedRequest, StubbedResponse, stubbedSupabase } from '../support/postgrest-stub';

// A counted range past the last of three rows
const pastTheEnd = (request: StubbedRequest): StubbedResponse =>
  request.method === 'HEAD'
    ? { status: 200, headers: { 'Content-Range': '*/3' } }
    : postgrestError(
        416,
        'PGRST103',
        'Requested range not satisfiable',
        'An offset of 40 was requested, but there are only 3 rows.'
      );

const productRow = {
  id: 1,
  name: 'Desk Lamp',
  description: 'LED lamp',
  price: '12.00',
  stock: 7,
  category_id: 1,
  created_at: '2026-01-01T10:00:00.000Z',
  updated_at: '2026-01-03T10:00:00.000Z',
  categories: { name: 'Furniture' },
};

const serviceOver = (client: ReturnType<typeof stubbedSupabase>['client']) =>
  new ProductService(new SupabaseProductRepository(client), new SupabaseCategoryRepository(client));

describe('SupabaseProductRepository', () => {
  it('answers a page past the end with no items and the full count', async () => {
    const { client, requests } = stubbedSupabase(pastTheEnd);

    const page = await serviceOver(client).getProductsPage({ pageNumber: 5, pageSize: 10 });

    expect(page).toEqual({ items: [], pageNumber: 5, pageSize: 10, totalCount: 3, totalPages: 1 });
    expect(requests.map((request) => request.method)).toEqual(['GET', 'HEAD']);
  });

  it('counts only matching products for a search page past the end', async () => {
    const { client, requests } = stubbedSupabase(pastTheEnd);

    const page = await serviceOver(client).searchProductsByNamePage('lamp', { pageNumber: 5, pageSize: 10 });

    expect(page).toMatchObject({ items: [], totalCount: 3, totalPages: 1 });
    expect(requests[1]?.url.searchParams.get('name')).toBe('ilike.%lamp%');
  });

  it('writes only the columns of a partial update', async () => {
    const { client, requests } = stubbedSupabase(() => ({ status: 200, body: productRow }));

    const updated = await new SupabaseProductRepository(client).update(1, { price: 12 });

    expect(requests[0]?.method).toBe('PATCH');
    expect(requests[0]?.body).toEqual({ price: 12, updated_at: expect.any(String) });
    expect(updated).toMatchObject({ id: 1, price: 12, stock: 7, categoryName: 'Furniture' });
  });
});
