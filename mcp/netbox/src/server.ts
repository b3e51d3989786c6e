/**
 * MCP server wiring
 *
 * Combines the tool categories, routes calls to their handlers and turns
 * every outcome into a result envelope.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type Tool } from '@modelcontextprotocol/sdk/types.js';

import { log, logToolCall } from './lib/logger.js';
import type { NetBoxClient } from './lib/netbox-client.js';
import { fail, guard, type ToolResult } from './lib/result.js';
import type { ToolArgs, ToolHandler } from './tools/common.js';
import { dcimTools, handleDcimTool } from './tools/dcim.js';
import { ipamTools, handleIpamTool } from './tools/ipam.js';
import { handleObjectTool, objectTools } from './tools/objects.js';
import { handleScriptTool, scriptTools } from './tools/scripts.js';

export const SERVER_NAME = 'netbox-mcp';
export const SERVER_VERSION = '0.1.0';

export const tools: Tool[] = [...dcimTools, ...ipamTools, ...objectTools, ...scriptTools];

// Tool name to handler mapping
const handlers = new Map<string, ToolHandler>();
dcimTools.forEach((t) => handlers.set(t.name, handleDcimTool));
ipamTools.forEach((t) => handlers.set(t.name, handleIpamTool));
objectTools.forEach((t) => handlers.set(t.name, handleObjectTool));
scriptTools.forEach((t) => handlers.set(t.name, handleScriptTool));

export type ToolCaller = (name: string, args: ToolArgs) => Promise<ToolResult>;

/**
 * Dispatcher bound to one NetBox client. Never rejects.
 */
export function createToolCaller(client: NetBoxClient): ToolCaller {
  return async (name, args) => {
    const startTime = Date.now();
    log.debug(`Tool call started: ${name}`, { tool: name });

    const handler = handlers.get(name);
    const result = handler
      ? await guard(() => handler(name, args, client))
      : fail(`Unknown tool: ${name}`);

    logToolCall(
      name,
      args,
      result.success ? { success: true } : { success: false, error: result.error },
      Date.now() - startTime
    );
    return result;
  };
}

export function createServer(callTool: ToolCaller): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const result = await callTool(name, args ?? {});

    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      isError: !result.success,
    };
  });

  return server;
}
