/**
 * MCP Server initialization and transport
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './tools/index.js';
import { logToStderr, interceptConsole } from './logger.js';
import type { ClosenessEngine } from '../../core/engine.js';
import { getVersion } from '../cli/version.js';

export function createMcpServer(engine: ClosenessEngine): McpServer {
  const server = new McpServer({
    name: 'gcl',
    version: getVersion(),
  });

  registerAllTools(server, engine);
  return server;
}

export async function startMcpServer(engine: ClosenessEngine): Promise<McpServer> {
  // Keep stdout clean for JSON-RPC
  interceptConsole();

  const server = createMcpServer(engine);
  await server.connect(new StdioServerTransport());

  logToStderr('[gcl] MCP Server started (stdio transport)');
  return server;
}
