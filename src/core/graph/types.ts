/**
 * Graph capabilities consumed by the centrality core and the oracles
 */

import type { Edge, NodeId } from '../../shared/types.js';

/**
 * Finite, restartable edge enumeration. The node set extractor needs
 * nothing more.
 */
export interface EdgeSource {
  allEdges(): Iterable<Edge>;
  /** Optional full node listing, including nodes without edges */
  allNodes?(): Iterable<NodeId>;
}

/**
 * Adjacency access for shortest-path oracles.
 */
export interface RoutingGraph extends EdgeSource {
  hasNode(node: NodeId): boolean;
  /** Edges leaving `node`, with `from === node` */
  outgoing(node: NodeId): Iterable<Edge>;
}
