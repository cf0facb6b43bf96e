/**
 * Shortest-path oracle contract
 */

import type { NodeId, PathResult } from '../../shared/types.js';
import type { RoutingGraph } from '../graph/types.js';

/** Distance of a destination with no path from the source */
export const UNREACHABLE = Number.POSITIVE_INFINITY;

export interface ShortestPathOracle {
  /** Clear per-query state; must be called before every query */
  reset(): void;
  shortestPath(source: NodeId, destination: NodeId): PathResult;
}

export type OracleFactory<G extends RoutingGraph = RoutingGraph> = (
  graph: G,
) => ShortestPathOracle;

export function unreachablePath(): PathResult {
  return { reachable: false, distance: UNREACHABLE, nodes: [] };
}
