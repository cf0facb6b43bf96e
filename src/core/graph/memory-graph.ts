/**
 * MemoryGraph - in-memory weighted graph
 *
 * Edges are stored once in insertion order. Bidirectional edges are
 * indexed under both endpoints; the reverse direction is served as a
 * swapped copy by outgoing().
 */

import type { Edge, NodeId } from '../../shared/types.js';
import { InvalidEdgeError } from '../../shared/errors.js';
import type { RoutingGraph } from './types.js';

export interface AddEdgeOptions {
  bidirectional?: boolean;
}

export class MemoryGraph implements RoutingGraph {
  private readonly edges: Edge[] = [];
  private readonly adjacency = new Map<NodeId, Edge[]>();

  static fromEdges(edges: Iterable<Edge>, nodes: Iterable<NodeId> = []): MemoryGraph {
    const graph = new MemoryGraph();
    for (const node of nodes) {
      graph.addNode(node);
    }
    for (const edge of edges) {
      graph.addEdge(edge.from, edge.to, edge.distance, {
        bidirectional: edge.bidirectional,
      });
    }
    return graph;
  }

  get nodeCount(): number {
    return this.adjacency.size;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  addNode(id: NodeId): void {
    assertNodeId(id);
    if (!this.adjacency.has(id)) {
      this.adjacency.set(id, []);
    }
  }

  addEdge(
    from: NodeId,
    to: NodeId,
    distance = 1,
    options: AddEdgeOptions = {},
  ): Edge {
    assertNodeId(from);
    assertNodeId(to);
    if (!Number.isFinite(distance) || distance < 0) {
      throw new InvalidEdgeError(
        `Edge ${from} -> ${to} has invalid distance ${distance}; expected a finite non-negative number`,
      );
    }

    const edge: Edge = {
      from,
      to,
      distance,
      bidirectional: options.bidirectional ?? true,
    };

    this.addNode(from);
    this.addNode(to);
    this.edges.push(edge);
    this.adjacencyOf(from).push(edge);
    if (edge.bidirectional && from !== to) {
      this.adjacencyOf(to).push(edge);
    }
    return edge;
  }

  hasNode(node: NodeId): boolean {
    return this.adjacency.has(node);
  }

  *allEdges(): IterableIterator<Edge> {
    yield* this.edges;
  }

  *allNodes(): IterableIterator<NodeId> {
    yield* this.adjacency.keys();
  }

  *outgoing(node: NodeId): IterableIterator<Edge> {
    for (const edge of this.adjacency.get(node) ?? []) {
      if (edge.from === node) {
        yield edge;
      } else {
        yield { ...edge, from: node, to: edge.from };
      }
    }
  }

  private adjacencyOf(node: NodeId): Edge[] {
    let list = this.adjacency.get(node);
    if (!list) {
      list = [];
      this.adjacency.set(node, list);
    }
    return list;
  }
}

export function isValidNodeId(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function assertNodeId(id: NodeId): void {
  if (!isValidNodeId(id)) {
    throw new InvalidEdgeError(`Invalid node id ${id}; expected a non-negative integer`);
  }
}
