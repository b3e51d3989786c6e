/**
 * HTTP/SSE Transport for the NetBox MCP Server
 *
 * Alternative to stdio for remote agents and manual testing.
 *
 * Endpoints:
 *   GET  /          - Usage info
 *   GET  /sse       - Establish SSE connection
 *   POST /message   - Send JSON-RPC message (requires sessionId query param)
 *   GET  /health    - Health check (MCP server only)
 *   GET  /check     - NetBox reachability (GET /api/status/)
 *   POST /api/call  - Direct tool invocation: {"tool": "get_sites", "args": {...}}
 *   POST /shutdown  - Graceful shutdown
 */

import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { z } from 'zod';
import { errorMessage } from '../lib/errors.js';
import { log } from '../lib/logger.js';
import type { ToolCaller } from '../server.js';

export type ConnectionChecker = () => Promise<{ connected: boolean; version?: string; error?: string }>;

export interface HttpTransportOptions {
  host: string;
  port: number;
  callTool: ToolCaller;
  checkConnection: ConnectionChecker;
  onShutdown?: (reason: string) => Promise<void>;
}

const apiCallSchema = z.object({
  tool: z.string().min(1),
  args: z.record(z.string(), z.unknown()).default({}),
});

async function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    req.on('data', (chunk) => (data += chunk));
    req.on('end', () => resolve(data));
    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
  });
  res.end(JSON.stringify(data));
}

export function startHttpTransport(mcpServer: Server, options: HttpTransportOptions): HttpServer {
  const sessions = new Map<string, SSEServerTransport>();
  const { host, port, callTool, checkConnection, onShutdown } = options;

  const httpServer = createServer(async (req, res) => {
    const url = new URL(req.url || '/', `http://${host}:${port}`);
    const path = url.pathname;
    const method = req.method?.toUpperCase() || 'GET';

    if (method === 'OPTIONS') {
      res.writeHead(204, {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type',
      });
      res.end();
      return;
    }

    try {
      if (path === '/' && method === 'GET') {
        sendJson(res, {
          name: 'netbox-mcp',
          transport: 'sse',
          endpoints: {
            '/sse': 'GET - Establish SSE connection',
            '/message?sessionId=xxx': 'POST - Send JSON-RPC message',
            '/health': 'GET - Health check',
            '/check': 'GET - Test NetBox connectivity',
            '/api/call': 'POST - Direct tool invocation (body: {"tool": "name", "args": {...}})',
            '/shutdown': 'POST - Graceful shutdown',
          },
        });
        return;
      }

      if (path === '/health' && method === 'GET') {
        sendJson(res, {
          status: 'ok',
          sessions: sessions.size,
          timestamp: new Date().toISOString(),
        });
        return;
      }

      if (path === '/check' && method === 'GET') {
        const result = await checkConnection();
        sendJson(res, { status: result.connected ? 'ok' : 'unreachable', netbox: result }, result.connected ? 200 : 503);
        return;
      }

      if (path === '/sse' && method === 'GET') {
        const transport = new SSEServerTransport('/message', res);
        const { sessionId } = transport;
        sessions.set(sessionId, transport);
        log.info('SSE connection established', { sessionId });

        res.on('close', () => {
          sessions.delete(sessionId);
          log.info('SSE connection closed', { sessionId });
        });

        await mcpServer.connect(transport);
        return;
      }

      if (path === '/message' && method === 'POST') {
        const sessionId = url.searchParams.get('sessionId');
        if (!sessionId) {
          sendJson(res, { error: 'Missing sessionId parameter' }, 400);
          return;
        }

        const transport = sessions.get(sessionId);
        if (!transport) {
          sendJson(res, { error: 'Invalid session' }, 404);
          return;
        }

        await transport.handlePostMessage(req, res);
        return;
      }

      if (path === '/api/call' && method === 'POST') {
        const raw = await readBody(req);
        let parsedJson: unknown;
        try {
          parsedJson = raw ? JSON.parse(raw) : {};
        } catch {
          sendJson(res, { error: 'Request body is not valid JSON' }, 400);
          return;
        }

        const body = apiCallSchema.safeParse(parsedJson);
        if (!body.success) {
          sendJson(res, { error: 'Body must be {"tool": string, "args"?: object}' }, 400);
          return;
        }

        const result = await callTool(body.data.tool, body.data.args);
        sendJson(res, result, result.success ? 200 : 422);
        return;
      }

      if (path === '/shutdown' && method === 'POST') {
        sendJson(res, { status: 'shutting down' });
        log.info('Shutdown requested over HTTP');
        await shutdown('http');
        return;
      }

      sendJson(res, { error: 'Not found' }, 404);
    } catch (error) {
      log.error('HTTP error', { path, error: errorMessage(error) });
      if (!res.headersSent) {
        sendJson(res, { error: errorMessage(error) }, 500);
      }
    }
  });

  async function shutdown(reason: string): Promise<void> {
    for (const transport of sessions.values()) {
      await transport.close();
    }
    sessions.clear();
    if (onShutdown) {
      await onShutdown(reason);
    }
    httpServer.close(() => {
      log.info('HTTP server closed');
      process.exit(0);
    });
  }

  httpServer.listen(port, host, () => {
    log.info(`NetBox MCP server listening on http://${host}:${port}`);
  });

  return httpServer;
}
