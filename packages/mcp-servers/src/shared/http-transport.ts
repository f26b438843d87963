/**
 * HTTP transport for McpServer.
 *
 * POST /mcp takes one JSON-RPC message and answers with its response
 * (202 with no body for notifications). GET /health reports liveness.
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import type { Logger } from './logger.js';
import type { McpServer } from './server.js';
import { JSON_RPC_ERRORS } from './types.js';

export interface HttpTransportOptions {
  host: string;
  port: number;
  logger: Logger;
}

export function createHttpApp(server: McpServer): Hono {
  const app = new Hono();

  app.get('/health', (c) => c.json({
    status: 'ok',
    server: server.info.name,
    version: server.info.version,
    timestamp: new Date().toISOString(),
  }));

  app.post('/mcp', async (c) => {
    let message: unknown;
    try {
      message = await c.req.json();
    } catch {
      return c.json({
        jsonrpc: '2.0',
        id: null,
        error: { code: JSON_RPC_ERRORS.PARSE_ERROR, message: 'Parse error' },
      }, 400);
    }

    const response = await server.handle(message);
    if (!response) {
      return c.body(null, 202);
    }
    return c.json(response);
  });

  return app;
}

/**
 * Serve the app with @hono/node-server; the returned server is closed by the
 * caller on shutdown.
 */
export function startHttpTransport(server: McpServer, options: HttpTransportOptions): ServerType {
  const app = createHttpApp(server);
  return serve({ fetch: app.fetch, hostname: options.host, port: options.port }, (info) => {
    options.logger.info(`${server.info.name} MCP Server v${server.info.version} listening`, {
      host: options.host,
      port: info.port,
    });
  });
}
