import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { createStore } from '../support/fixtures';
import { startServer, TestServer } from '../support/http';

describe('Service endpoints', () => {
  let server: TestServer;

  beforeAll(async () => {
    const store = await createStore();
    server = await startServer(store.services);
  });

  afterAll(async () => {
    await server.close();
  });

  it('reports health', async () => {
    const response = await server.client.get('/health');

    expect(response.status).toBe(200);
    expect(response.data.status).toBe('healthy');
  });

  it('reports the API version', async () => {
    const response = await server.client.get('/api');

    expect(response.data).toEqual({ version: '1.0.0', api: 'Store API' });
  });

  it('serves the OpenAPI document built from the route annotations', async () => {
    const response = await server.client.get('/openapi.json');

    expect(response.status).toBe(200);
    expect(response.data.info.title).toBe('Store API');
    expect(Object.keys(response.data.paths)).toContain('/api/orders');
  });

  it('serves the docs page', async () => {
    const response = await server.client.get('/docs');

    expect(response.status).toBe(200);
    expect(response.data).toContain('<title>Store API Docs</title>');
  });
});
