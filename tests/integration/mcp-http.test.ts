/**
 * Integration tests for MCP over Streamable HTTP
 */

import { afterEach, describe, expect, it } from 'vitest';

import { createApp } from '@/app/build-app.js';

import { makeReferenceCodes, makeTestConfig } from '../fixtures/builders.js';
import { makeFixtureRepo } from '../fixtures/fakes.js';

import type { AppConfig } from '@/infra/config/index.js';
import type { FastifyInstance } from 'fastify';

const MCP_HEADERS = {
  'content-type': 'application/json',
  accept: 'application/json, text/event-stream',
};

const LIST_TOOLS = { jsonrpc: '2.0', id: 1, method: 'tools/list', params: {} };

describe('MCP HTTP routes', () => {
  let app: FastifyInstance | undefined;

  const start = async (mcp: AppConfig['mcp']) => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        fiscalDataRepo: makeFixtureRepo(),
        referenceCodes: makeReferenceCodes(),
        config: makeTestConfig({ mcp }),
      },
    });
    return app;
  };

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('answers a JSON-RPC request without a session', async () => {
    const server = await start({ authRequired: false, apiKey: undefined });

    const response = await server.inject({
      method: 'POST',
      url: '/mcp',
      headers: MCP_HEADERS,
      payload: LIST_TOOLS,
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.id).toBe(1);
    expect(body.result.tools).toHaveLength(13);
  });

  it('rejects a request without the API key', async () => {
    const server = await start({ authRequired: true, apiKey: 'test-secret' });

    const response = await server.inject({
      method: 'POST',
      url: '/mcp',
      headers: MCP_HEADERS,
      payload: LIST_TOOLS,
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32001, message: 'Unauthorized' },
      id: null,
    });
  });

  it('accepts the configured API key', async () => {
    const server = await start({ authRequired: true, apiKey: 'test-secret' });

    const response = await server.inject({
      method: 'POST',
      url: '/mcp',
      headers: { ...MCP_HEADERS, 'x-api-key': 'test-secret' },
      payload: LIST_TOOLS,
    });

    expect(response.statusCode).toBe(200);
  });

  it.each(['GET', 'DELETE'] as const)('answers %s with 405', async (method) => {
    const server = await start({ authRequired: false, apiKey: undefined });

    const response = await server.inject({ method, url: '/mcp' });

    expect(response.statusCode).toBe(405);
    expect(response.json().error).toEqual({ code: -32000, message: 'Method not allowed.' });
  });
});
