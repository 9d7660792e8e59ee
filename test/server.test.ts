// This test suite verifies the assembled application: operational endpoints, the RPC route, and discovery.

import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { loadServerConfig } from '../src/config/config.js';
import { createBuiltinMux } from '../src/handlers/builtin.js';
import { createServer } from '../src/server.js';

const app = createServer({
  config: loadServerConfig({ RPC_PATH: '/jsonrpc', LOG_LEVEL: 'silent' }),
  handler: createBuiltinMux(),
  logger: false
});

describe('server', () => {
  beforeAll(async () => {
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('reports liveness and version', async () => {
    const health = await app.inject({ method: 'GET', url: '/health' });
    const version = await app.inject({ method: 'GET', url: '/version' });

    expect(health.statusCode).toBe(200);
    expect(health.json()).toMatchObject({ ok: true, status: 'alive' });
    expect(version.json()).toEqual({ ok: true, name: 'rpcbridge', version: '0.1.0' });
  });

  it('serves JSON-RPC calls on the configured path', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/jsonrpc',
      headers: { 'content-type': 'application/json' },
      payload: '{"jsonrpc":"2.0","method":"Echo","params":{"foo":"bar"},"id":"1"}'
    });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe('{"jsonrpc":"2.0","result":{"foo":"bar"},"id":"1"}');
  });

  it('reads the body raw whatever content type the client sends', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/jsonrpc',
      headers: { 'content-type': 'text/plain' },
      payload: '{"jsonrpc":"2.0","method":"sum","params":[2,3],"id":9}'
    });

    expect(response.body).toBe('{"jsonrpc":"2.0","result":5,"id":9}');
  });

  it('lists registered methods on GET', async () => {
    const response = await app.inject({ method: 'GET', url: '/jsonrpc' });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.ok).toBe(true);
    expect(body.endpoint).toBe('/jsonrpc');
    expect(body.methods.map((entry: { name: string }) => entry.name)).toEqual(['Echo', 'ping', 'server.info', 'sum']);
  });

  it('reports server info through JSON-RPC', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/jsonrpc',
      headers: { 'content-type': 'application/json' },
      payload: '{"jsonrpc":"2.0","method":"server.info","id":1}'
    });

    expect(response.json().result).toEqual({
      name: 'rpcbridge',
      version: '0.1.0',
      methods: ['Echo', 'ping', 'server.info', 'sum']
    });
  });

  it('keeps JSON parsing for routes outside the RPC scope', async () => {
    const response = await app.inject({ method: 'POST', url: '/health', payload: { a: 1 } });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: { code: 'not_found', message: 'Route not found: POST /health' }
    });
  });
});
