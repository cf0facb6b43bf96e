import type { NodeId } from '../../shared/types.js';
import { OracleQueryError } from '../../shared/errors.js';
import type { RoutingGraph } from '../graph/types.js';

export function assertQueryable(
  graph: RoutingGraph,
  source: NodeId,
  destination: NodeId,
): void {
  if (!graph.hasNode(source)) {
    throw new OracleQueryError(`unknown source node ${source}`, source, destination);
  }
  if (!graph.hasNode(destination)) {
    throw new OracleQueryError(`unknown destination node ${destination}`, source, destination);
  }
}

/**
 * Walk parent links back from the destination.
 */
export function buildPath(
  parents: ReadonlyMap<NodeId, NodeId>,
  source: NodeId,
  destination: NodeId,
): NodeId[] {
  const path: NodeId[] = [destination];
  let current = destination;
  while (current !== source) {
    const parent = parents.get(current);
    if (parent === undefined) {
      throw new OracleQueryError(`broken parent chain at node ${current}`, source, destination);
    }
    path.push(parent);
    current = parent;
  }
  return path.reverse();
}
