/**
 * Register all MCP tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ClosenessEngine } from '../../../core/engine.js';
import { registerComputeClosenessTool } from './gcl-compute-closeness.js';
import { registerGetStatusTool } from './gcl-get-status.js';

export function registerAllTools(
  server: McpServer,
  engine: ClosenessEngine,
): void {
  registerComputeClosenessTool(server, engine);
  registerGetStatusTool(server, engine);
}
