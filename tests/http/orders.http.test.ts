import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createStore, stockOf, StoreFixture } from '../support/fixtures';
import { startServer, TestServer } from '../support/http';

describe('Orders API', () => {
  let store: StoreFixture;
  let server: TestServer;

  beforeEach(async () => {
    store = await createStore();
    server = await startServer(store.services);
  });

  afterEach(async () => {
    await server.close();
  });

  const createOrder = () =>
    server.client.post('/api/orders', {
      userId: store.customer.id,
      shippingAddress: '1 Test Street',
      orderItems: [
        { productId: store.lamp.id, quantity: 2 },
        { productId: store.shelf.id, quantity: 1 },
      ],
    });

  describe('POST /api/orders', () => {
    it('creates the order and points to it', async () => {
      const response = await createOrder();

      expect(response.status).toBe(201);
      expect(response.headers['location']).toBe('/api/orders/1');
      expect(response.data).toMatchObject({
        id: 1,
        userId: store.customer.id,
        userName: 'Test Customer',
        totalAmount: 45,
        status: 'Pending',
        shippingAddress: '1 Test Street',
      });
      expect(response.data.orderItems).toHaveLength(2);
      expect(response.data).not.toHaveProperty('shippedDate');
      expect(await stockOf(store.repos, store.lamp.id)).toBe(8);
    });

    it('rejects an order without items', async () => {
      const response = await server.client.post('/api/orders', {
        userId: store.customer.id,
        shippingAddress: '1 Test Street',
        orderItems: [],
      });

      expect(response.status).toBe(400);
      expect(response.data.message).toBe('orderItems: Order must contain at least one item');
      expect(response.data.code).toBe('VALIDATION_ERROR');
    });

    it('rejects a zero quantity', async () => {
      const response = await server.client.post('/api/orders', {
        userId: store.customer.id,
        shippingAddress: '1 Test Street',
        orderItems: [{ productId: store.lamp.id, quantity: 0 }],
      });

      expect(response.status).toBe(400);
      expect(response.data.message).toBe('orderItems.0.quantity: Quantity must be at least 1');
    });

    it('answers 400 for an unknown product', async () => {
      const response = await server.client.post('/api/orders', {
        userId: store.customer.id,
        shippingAddress: '1 Test Street',
        orderItems: [{ productId: 999, quantity: 1 }],
      });

      expect(response.status).toBe(400);
      expect(response.data).toEqual({
        message: 'Product with ID 999 does not exist.',
        code: 'INVALID_REFERENCE',
        details: { productId: 999 },
      });
    });

    it('answers 400 for insufficient stock', async () => {
      const response = await server.client.post('/api/orders', {
        userId: store.customer.id,
        shippingAddress: '1 Test Street',
        orderItems: [{ productId: store.shelf.id, quantity: 9 }],
      });

      expect(response.status).toBe(400);
      expect(response.data.message).toBe('Insufficient stock for product Bookshelf. Available: 5');
    });

    it('answers 400 for malformed JSON', async () => {
      const response = await server.client.post('/api/orders', '{"userId": ', {
        headers: { 'Content-Type': 'application/json' },
      });

      expect(response.status).toBe(400);
      expect(response.data).toEqual({
        message: 'Request body is not valid JSON',
        code: 'VALIDATION_ERROR',
      });
    });
  });

  it('rejects ids in the order body past the integer range', async () => {
    const response = await server.client.post('/api/orders', {
      userId: 1e20,
      shippingAddress: '1 Test Street',
      orderItems: [{ productId: store.lamp.id, quantity: 1 }],
    });

    expect(response.status).toBe(400);
    expect(response.data.message).toBe('userId: User ID is out of range');
    expect(await stockOf(store.repos, store.lamp.id)).toBe(10);
  });

  describe('GET /api/orders', () => {
    it('reads an order by id and by user', async () => {
      await createOrder();

      const byId = await server.client.get('/api/orders/1');
      expect(byId.status).toBe(200);
      expect(byId.data.orderItems.map((item: { productName: string }) => item.productName)).toEqual([
        'Desk Lamp',
        'Bookshelf',
      ]);

      const byUser = await server.client.get(`/api/orders/user/${store.customer.id}`);
      expect(byUser.status).toBe(200);
      expect(byUser.data).toHaveLength(1);
    });

    it('answers 404 for a missing order', async () => {
      const response = await server.client.get('/api/orders/42');

      expect(response.status).toBe(404);
      expect(response.data).toEqual({ message: 'Order with ID 42 not found.', code: 'ORDER_NOT_FOUND' });
    });

    it('answers 400 for a malformed id', async () => {
      const response = await server.client.get('/api/orders/abc');

      expect(response.status).toBe(400);
      expect(response.data.message).toBe('id: Invalid order ID format');
    });

    it('answers 400 for an id past the integer range', async () => {
      const response = await server.client.get('/api/orders/99999999999999999999');

      expect(response.status).toBe(400);
      expect(response.data.message).toBe('id: Invalid order ID format');
    });

    it('hides unexpected failures behind a generic 500', async () => {
      vi.spyOn(store.services.orderService, 'getAllOrders').mockRejectedValueOnce(
        new Error('connection reset')
      );

      const response = await server.client.get('/api/orders');

      expect(response.status).toBe(500);
      expect(response.data).toEqual({
        message: 'An unexpected error occurred',
        code: 'INTERNAL_ERROR',
      });
    });
  });

  describe('PUT /api/orders/:id', () => {
    it('ships an order', async () => {
      await createOrder();

      const response = await server.client.put('/api/orders/1', { status: 'Shipped' });

      expect(response.status).toBe(200);
      expect(response.data.status).toBe('Shipped');
      expect(typeof response.data.shippedDate).toBe('string');
    });

    it('answers 404 for a missing order', async () => {
      const response = await server.client.put('/api/orders/77', { status: 'Shipped' });

      expect(response.status).toBe(404);
      expect(response.data.message).toBe('Order with ID 77 not found.');
    });

    it('answers 400 for an unknown status', async () => {
      await createOrder();

      const response = await server.client.put('/api/orders/1', { status: 'Lost' });

      expect(response.status).toBe(400);
      expect(response.data.code).toBe('INVALID_STATUS');
      expect(response.data.message).toBe(
        'Invalid status. Valid values are: Pending, Processing, Shipped, Delivered, Cancelled'
      );
    });
  });

  describe('DELETE /api/orders/:id', () => {
    it('deletes once and then answers 404', async () => {
      await createOrder();

      const first = await server.client.delete('/api/orders/1');
      expect(first.status).toBe(204);

      const second = await server.client.delete('/api/orders/1');
      expect(second.status).toBe(404);
      expect(second.data.code).toBe('ORDER_NOT_FOUND');
    });
  });

  it('answers 404 for unknown routes', async () => {
    const response = await server.client.get('/api/nothing');

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ message: 'Route GET /api/nothing not found', code: 'NOT_FOUND' });
  });
});
