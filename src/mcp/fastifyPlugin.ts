/**
 * Fastify plugin that mounts the MCP server on a route prefix.
 *
 * Registers POST / for JSON-RPC requests (stateless Streamable HTTP).
 * Returns 405 for GET / and DELETE / (no SSE or session teardown in stateless mode).
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export interface McpPluginOptions extends FastifyPluginOptions {
  /** Builds a fresh server for each request; stateless transports are not shared. */
  createMcpServer: () => McpServer;
}

export async function mcpPlugin(
  fastify: FastifyInstance,
  opts: McpPluginOptions
): Promise<void> {
  const { createMcpServer } = opts;

  // Disable Fastify body parsing for this scope — MCP transport parses raw body
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      done(null, JSON.parse(String(body)));
    } catch (err) {
      // Malformed JSON → 400
      const parseError = err instanceof Error ? err : new Error(String(err));
      done(Object.assign(parseError, { statusCode: 400 }), undefined);
    }
  });

  // POST / — handle MCP JSON-RPC requests
  fastify.post('/', async (request, reply) => {
    const mcpServer = createMcpServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    reply.raw.on('close', () => {
      transport.close().catch((err: unknown) => {
        request.log.warn({ err }, 'Failed to close MCP transport');
      });
      mcpServer.close().catch((err: unknown) => {
        request.log.warn({ err }, 'Failed to close MCP server');
      });
    });

    await mcpServer.connect(transport);

    // Hijack so Fastify doesn't try to send a second response
    reply.hijack();

    await transport.handleRequest(request.raw, reply.raw, request.body);
  });

  // GET / and DELETE / — not supported in stateless mode
  fastify.get('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'Method Not Allowed — stateless mode, no SSE' });
  });

  fastify.delete('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'Method Not Allowed — stateless mode, no session teardown' });
  });
}
