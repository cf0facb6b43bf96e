/**
 * gcl_compute_closeness - Rank nodes of the stored graph by closeness centrality
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ClosenessEngine } from '../../../core/engine.js';
import { NODE_POLICIES, ORACLE_KINDS } from '../../../config/types.js';
import type { ComputeClosenessInput } from '../../../shared/types.js';
import { toJson } from '../../cli/output/json-output.js';
import { toMcpError } from '../errors.js';
import { logToStderr } from '../logger.js';

export function registerComputeClosenessTool(
  server: McpServer,
  engine: ClosenessEngine,
): void {
  server.tool(
    'gcl_compute_closeness',
    [
      'Compute Freeman closeness centrality, (n - 1) / sum of shortest-path distances,',
      'for every node of the stored graph and return the highest-ranked nodes.',
      'A node that cannot reach every other node scores 0.',
    ].join('\n'),
    {
      oracle: z
        .enum(ORACLE_KINDS)
        .optional()
        .describe('Shortest-path oracle: dijkstra (weighted) or bfs (hop count)'),
      node_policy: z
        .enum(NODE_POLICIES)
        .optional()
        .describe('edges: endpoints of edges only; all: include isolated nodes'),
      top: z
        .number()
        .int()
        .min(0)
        .optional()
        .describe('Ranking length (0 = every node; default from config)'),
    },
    async (input: ComputeClosenessInput) => {
      try {
        const result = engine.computeCloseness({
          oracle: input.oracle,
          nodePolicy: input.node_policy,
          top: input.top,
        });

        logToStderr(
          `gcl_compute_closeness: ${result.node_count} nodes in ${result.elapsed_ms.toFixed(1)}ms`,
          'debug',
        );

        return {
          content: [{ type: 'text' as const, text: toJson(result) }],
        };
      } catch (error) {
        throw toMcpError(error);
      }
    },
  );
}
