import { describe, it, expect } from 'vitest';
import { extractNodeSet } from './node-set.js';
import { MemoryGraph } from '../graph/memory-graph.js';
import { ConfigError, GraphAccessError, InvalidEdgeError } from '../../shared/errors.js';
import type { Edge } from '../../shared/types.js';

function edge(from: number, to: number): Edge {
  return { from, to, distance: 1, bidirectional: true };
}

describe('extractNodeSet', () => {
  it('collects every edge endpoint exactly once', () => {
    const nodes = extractNodeSet({
      allEdges: () => [edge(3, 1), edge(1, 2), edge(2, 3), edge(3, 1)],
    });

    expect([...nodes]).toEqual([3, 1, 2]);
  });

  it('is empty for a graph without edges', () => {
    expect(extractNodeSet({ allEdges: () => [] }).size).toBe(0);
  });

  it('ignores isolated nodes under the edges policy', () => {
    const graph = new MemoryGraph();
    graph.addNode(9);
    graph.addEdge(0, 1);

    expect([...extractNodeSet(graph)]).toEqual([0, 1]);
  });

  it('includes isolated nodes under the all policy', () => {
    const graph = new MemoryGraph();
    graph.addNode(9);
    graph.addEdge(0, 1);

    expect([...extractNodeSet(graph, 'all')]).toEqual([9, 0, 1]);
  });

  it('needs a node listing for the all policy', () => {
    expect(() => extractNodeSet({ allEdges: () => [] }, 'all')).toThrow(ConfigError);
  });

  it('does not mutate the graph', () => {
    const graph = new MemoryGraph();
    graph.addEdge(0, 1);
    graph.addEdge(1, 2);
    const before = [...graph.allEdges()];

    extractNodeSet(graph, 'all');

    expect([...graph.allEdges()]).toEqual(before);
    expect(graph.nodeCount).toBe(3);
  });

  it('wraps enumeration failures in GraphAccessError', () => {
    const graph = {
      *allEdges(): Iterable<Edge> {
        yield edge(0, 1);
        throw new Error('cursor closed');
      },
    };

    try {
      extractNodeSet(graph);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(GraphAccessError);
      expect((error as GraphAccessError).cause?.message).toBe('cursor closed');
    }
  });

  it('passes project errors through unchanged', () => {
    const failure = new InvalidEdgeError('bad edge');

    expect(() =>
      extractNodeSet({
        allEdges: () => {
          throw failure;
        },
      }),
    ).toThrow(failure);
  });
});
