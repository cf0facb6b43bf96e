/**
 * gcl_get_status - Graph size and last closeness run
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ClosenessEngine } from '../../../core/engine.js';
import { toJson } from '../../cli/output/json-output.js';
import { toMcpError } from '../errors.js';

export function registerGetStatusTool(
  server: McpServer,
  engine: ClosenessEngine,
): void {
  server.tool(
    'gcl_get_status',
    'Get node and edge counts, isolated nodes and the last closeness run of the stored graph.',
    async () => {
      try {
        return {
          content: [{ type: 'text' as const, text: toJson(engine.getStatus()) }],
        };
      } catch (error) {
        throw toMcpError(error);
      }
    },
  );
}
