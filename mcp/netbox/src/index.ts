#!/usr/bin/env node
/**
 * NetBox MCP Server
 *
 * Exposes NetBox inventory (DCIM, IPAM, generic objects, custom scripts)
 * as MCP tools for Claude Desktop or any MCP client.
 *
 * Configuration via environment variables (or a .env file):
 *   NETBOX_URL         - NetBox base URL (required)
 *   NETBOX_TOKEN       - API token (required)
 *   NETBOX_VERIFY_SSL  - Verify TLS certificates (default: true)
 *   NETBOX_AUTH_SCHEME - Token or Bearer (default: Token)
 *   NETBOX_TIMEOUT_MS  - Per-request timeout (default: 30000)
 *   HTTP_PORT          - Serve HTTP/SSE on this port instead of stdio
 *   HTTP_HOST          - Bind address for HTTP_PORT (default: localhost)
 *   LOG_LEVEL          - DEBUG, INFO, WARN, ERROR (default: INFO)
 *   LOG_FILE           - Also append JSON log lines to this file
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig, loadDotEnv, type ServerConfig } from './lib/config.js';
import { ConfigurationError, errorMessage } from './lib/errors.js';
import { log } from './lib/logger.js';
import { NetBoxRestClient, type NetBoxClient } from './lib/netbox-client.js';
import { createShutdownHandler } from './lib/shutdown.js';
import { createServer, createToolCaller, SERVER_VERSION } from './server.js';
import { startHttpTransport } from './transports/http.js';

function readConfig(): ServerConfig {
  loadDotEnv();
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

async function checkNetBoxConnection(client: NetBoxClient): Promise<{ connected: boolean; version?: string; error?: string }> {
  try {
    const status = await client.status();
    const version = status['netbox-version'];
    return { connected: true, version: typeof version === 'string' ? version : undefined };
  } catch (error) {
    return { connected: false, error: errorMessage(error) };
  }
}

async function main(): Promise<void> {
  const config = readConfig();

  if (!config.netbox.verifySsl) {
    // Applies to every fetch in this process
    process.env.NODE_TLS_REJECT_UNAUTHORIZED = '0';
    log.warn('TLS certificate verification disabled (NETBOX_VERIFY_SSL=false)');
  }

  const client = new NetBoxRestClient(config.netbox);
  const callTool = createToolCaller(client);
  const server = createServer(callTool);

  log.info('Starting NetBox MCP server', {
    version: SERVER_VERSION,
    netbox: config.netbox.url,
    transport: config.http ? 'http' : 'stdio',
  });

  if (config.http) {
    const httpServer = startHttpTransport(server, {
      host: config.http.host,
      port: config.http.port,
      callTool,
      checkConnection: () => checkNetBoxConnection(client),
      onShutdown: async (reason) => {
        log.info('Shutdown handler called', { reason });
        await server.close();
      },
    });
    listenForSignals(async () => {
      await server.close();
      httpServer.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    });
    return;
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  listenForSignals(() => server.close());
  log.info('NetBox MCP server started (stdio)', { pid: process.pid });
}

function listenForSignals(close: () => Promise<void>): void {
  const shutdown = createShutdownHandler(close);
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, (received) => {
      void shutdown(received);
    });
  }
}

main().catch((error: unknown) => {
  log.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
