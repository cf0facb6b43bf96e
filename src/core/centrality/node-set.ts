/**
 * Node set extraction
 *
 * The `edges` policy only sees endpoints of enumerated edges, so nodes
 * without incident edges are left out. The `all` policy adds the graph's
 * own node listing and needs a graph that provides one.
 */

import type { NodeId, NodePolicy } from '../../shared/types.js';
import { ClosenessError, ConfigError, GraphAccessError, toError } from '../../shared/errors.js';
import type { EdgeSource } from '../graph/types.js';

export function extractNodeSet(
  graph: EdgeSource,
  policy: NodePolicy = 'edges',
): Set<NodeId> {
  const nodes = new Set<NodeId>();

  if (policy === 'all') {
    if (!graph.allNodes) {
      throw new ConfigError(
        "Node policy 'all' needs a graph that enumerates its nodes",
      );
    }
    enumerate(() => {
      for (const node of graph.allNodes?.() ?? []) nodes.add(node);
    });
  }

  enumerate(() => {
    for (const edge of graph.allEdges()) {
      nodes.add(edge.from);
      nodes.add(edge.to);
    }
  });

  return nodes;
}

function enumerate(fn: () => void): void {
  try {
    fn();
  } catch (err) {
    if (err instanceof ClosenessError) throw err;
    throw new GraphAccessError('Failed to enumerate graph', toError(err));
  }
}
