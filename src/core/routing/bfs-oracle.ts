/**
 * BreadthFirstOracle - hop-count shortest paths, ignoring edge distances
 */

import type { NodeId, PathResult } from '../../shared/types.js';
import { OracleQueryError } from '../../shared/errors.js';
import type { RoutingGraph } from '../graph/types.js';
import { unreachablePath, type ShortestPathOracle } from './types.js';
import { assertQueryable, buildPath } from './path-utils.js';

export class BreadthFirstOracle implements ShortestPathOracle {
  private readonly depth = new Map<NodeId, number>();
  private readonly parents = new Map<NodeId, NodeId>();
  private queue: NodeId[] = [];
  private dirty = false;

  constructor(private readonly graph: RoutingGraph) {}

  reset(): void {
    this.depth.clear();
    this.parents.clear();
    this.queue = [];
    this.dirty = false;
  }

  shortestPath(source: NodeId, destination: NodeId): PathResult {
    if (this.dirty) {
      throw new OracleQueryError(
        'state from the previous query was not reset',
        source,
        destination,
      );
    }
    assertQueryable(this.graph, source, destination);
    this.dirty = true;

    if (source === destination) {
      return { reachable: true, distance: 0, nodes: [source] };
    }

    this.depth.set(source, 0);
    this.queue.push(source);

    for (let head = 0; head < this.queue.length; head++) {
      const node = this.queue[head];
      if (node === undefined) break;
      const nextDepth = (this.depth.get(node) ?? 0) + 1;

      for (const edge of this.graph.outgoing(node)) {
        if (this.depth.has(edge.to)) continue;
        this.depth.set(edge.to, nextDepth);
        this.parents.set(edge.to, node);
        if (edge.to === destination) {
          return {
            reachable: true,
            distance: nextDepth,
            nodes: buildPath(this.parents, source, destination),
          };
        }
        this.queue.push(edge.to);
      }
    }

    return unreachablePath();
  }
}
