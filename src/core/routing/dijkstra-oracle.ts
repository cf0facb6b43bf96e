/**
 * DijkstraOracle - single-pair Dijkstra over non-negative edge distances
 *
 * Settles nodes in distance order from the source and stops as soon as the
 * destination is settled. Per-query state (tentative distances, parents,
 * settled set, heap) lives on the instance, so reset() is required between
 * queries and one instance must not be shared by concurrent workers.
 */

import type { NodeId, PathResult } from '../../shared/types.js';
import { OracleQueryError } from '../../shared/errors.js';
import type { RoutingGraph } from '../graph/types.js';
import { MinHeap } from './min-heap.js';
import { unreachablePath, type ShortestPathOracle } from './types.js';
import { assertQueryable, buildPath } from './path-utils.js';

export class DijkstraOracle implements ShortestPathOracle {
  private readonly distances = new Map<NodeId, number>();
  private readonly parents = new Map<NodeId, NodeId>();
  private readonly settled = new Set<NodeId>();
  private readonly heap = new MinHeap<NodeId>();
  private dirty = false;

  constructor(private readonly graph: RoutingGraph) {}

  reset(): void {
    this.distances.clear();
    this.parents.clear();
    this.settled.clear();
    this.heap.clear();
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

    this.distances.set(source, 0);
    this.heap.push(source, 0);

    for (let entry = this.heap.pop(); entry; entry = this.heap.pop()) {
      const { value: node, priority: distance } = entry;
      if (this.settled.has(node)) continue;
      this.settled.add(node);

      if (node === destination) {
        return {
          reachable: true,
          distance,
          nodes: buildPath(this.parents, source, destination),
        };
      }

      for (const edge of this.graph.outgoing(node)) {
        if (this.settled.has(edge.to)) continue;
        const candidate = distance + edge.distance;
        const known = this.distances.get(edge.to);
        if (known === undefined || candidate < known) {
          this.distances.set(edge.to, candidate);
          this.parents.set(edge.to, node);
          this.heap.push(edge.to, candidate);
        }
      }
    }

    return unreachablePath();
  }
}
