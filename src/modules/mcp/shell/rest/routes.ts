/**
 * MCP HTTP Routes
 *
 * Stateless Streamable HTTP: every POST /mcp gets its own server and
 * transport, closed when the response ends. GET and DELETE are not
 * supported without sessions.
 */

import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';

import type { McpConfig } from '../../core/types.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeMcpRoutesDeps {
  /** Builds a fresh server per request */
  createServer: () => McpServer;
  config: McpConfig;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Verifies API key if configured.
 */
function verifyApiKey(request: FastifyRequest, config: McpConfig): boolean {
  const configuredApiKey = config.apiKey;
  if (configuredApiKey === undefined || configuredApiKey === '') {
    return true; // No API key configured, allow all
  }
  const providedKey = request.headers['x-api-key'];
  return providedKey === configuredApiKey;
}

/**
 * Sends an MCP JSON-RPC error response.
 */
function sendMcpError(
  reply: FastifyReply,
  code: number,
  message: string,
  httpStatus: number
): FastifyReply {
  return reply.code(httpStatus).type('application/json').send({
    jsonrpc: '2.0',
    error: { code, message },
    id: null,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Route Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates MCP HTTP routes for Fastify.
 */
export async function makeMcpRoutes(
  fastify: FastifyInstance,
  deps: MakeMcpRoutesDeps
): Promise<void> {
  const { createServer, config } = deps;

  // ─────────────────────────────────────────────────────────────────────────
  // POST /mcp - Handle one JSON-RPC message
  // ─────────────────────────────────────────────────────────────────────────

  fastify.post('/mcp', async (request, reply) => {
    if (config.authRequired && !verifyApiKey(request, config)) {
      return sendMcpError(reply, -32001, 'Unauthorized', 401);
    }

    const server = createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    reply.raw.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        request.log.warn({ err: error }, 'Failed to close MCP transport');
      });
    });

    await server.connect(transport);

    // Hijack the response and let transport handle it
    reply.hijack();
    await transport.handleRequest(request.raw, reply.raw, request.body);
  });

  // ─────────────────────────────────────────────────────────────────────────
  // GET, DELETE /mcp - No sessions to stream from or terminate
  // ─────────────────────────────────────────────────────────────────────────

  const methodNotAllowed = async (_request: FastifyRequest, reply: FastifyReply) => {
    return sendMcpError(reply, -32000, 'Method not allowed.', 405);
  };

  fastify.get('/mcp', methodNotAllowed);
  fastify.delete('/mcp', methodNotAllowed);
}
