import { describe, it, expect } from 'vitest';
import { MemoryGraph, isValidNodeId } from './memory-graph.js';
import { InvalidEdgeError } from '../../shared/errors.js';

describe('MemoryGraph', () => {
  it('starts empty', () => {
    const graph = new MemoryGraph();
    expect(graph.nodeCount).toBe(0);
    expect(graph.edgeCount).toBe(0);
    expect([...graph.allEdges()]).toEqual([]);
  });

  it('registers both endpoints when adding an edge', () => {
    const graph = new MemoryGraph();
    graph.addEdge(1, 2, 3.5);

    expect(graph.hasNode(1)).toBe(true);
    expect(graph.hasNode(2)).toBe(true);
    expect(graph.hasNode(3)).toBe(false);
    expect(graph.nodeCount).toBe(2);
  });

  it('defaults to distance 1 and bidirectional edges', () => {
    const graph = new MemoryGraph();
    const edge = graph.addEdge(4, 5);

    expect(edge).toEqual({ from: 4, to: 5, distance: 1, bidirectional: true });
  });

  it('enumerates each edge once in insertion order', () => {
    const graph = new MemoryGraph();
    graph.addEdge(0, 1);
    graph.addEdge(1, 2, 2, { bidirectional: false });

    expect([...graph.allEdges()]).toEqual([
      { from: 0, to: 1, distance: 1, bidirectional: true },
      { from: 1, to: 2, distance: 2, bidirectional: false },
    ]);
  });

  it('is restartable', () => {
    const graph = new MemoryGraph();
    graph.addEdge(0, 1);

    expect([...graph.allEdges()]).toHaveLength(1);
    expect([...graph.allEdges()]).toHaveLength(1);
  });

  it('serves reversed copies of bidirectional edges from outgoing()', () => {
    const graph = new MemoryGraph();
    graph.addEdge(0, 1, 2);

    expect([...graph.outgoing(1)]).toEqual([
      { from: 1, to: 0, distance: 2, bidirectional: true },
    ]);
    expect([...graph.outgoing(0)]).toEqual([
      { from: 0, to: 1, distance: 2, bidirectional: true },
    ]);
  });

  it('does not traverse directed edges backwards', () => {
    const graph = new MemoryGraph();
    graph.addEdge(0, 1, 1, { bidirectional: false });

    expect([...graph.outgoing(0)]).toHaveLength(1);
    expect([...graph.outgoing(1)]).toEqual([]);
  });

  it('lists a self-loop once in outgoing()', () => {
    const graph = new MemoryGraph();
    graph.addEdge(3, 3, 1);

    expect([...graph.outgoing(3)]).toHaveLength(1);
  });

  it('keeps explicit nodes ahead of edge endpoints', () => {
    const graph = MemoryGraph.fromEdges(
      [{ from: 0, to: 1, distance: 1, bidirectional: false }],
      [7, 0],
    );

    expect([...graph.allNodes()]).toEqual([7, 0, 1]);
  });

  it('rejects negative or fractional node ids', () => {
    const graph = new MemoryGraph();
    expect(() => graph.addEdge(-1, 2)).toThrow(InvalidEdgeError);
    expect(() => graph.addEdge(1, 2.5)).toThrow(InvalidEdgeError);
    expect(() => graph.addNode(Number.NaN)).toThrow(InvalidEdgeError);
  });

  it('rejects negative and non-finite distances', () => {
    const graph = new MemoryGraph();
    expect(() => graph.addEdge(0, 1, -0.5)).toThrow(InvalidEdgeError);
    expect(() => graph.addEdge(0, 1, Number.POSITIVE_INFINITY)).toThrow(InvalidEdgeError);
    expect(graph.edgeCount).toBe(0);
  });

  it('accepts zero-weight edges', () => {
    const graph = new MemoryGraph();
    expect(graph.addEdge(0, 1, 0).distance).toBe(0);
  });
});

describe('isValidNodeId', () => {
  it('accepts non-negative safe integers only', () => {
    expect(isValidNodeId(0)).toBe(true);
    expect(isValidNodeId(42)).toBe(true);
    expect(isValidNodeId(-1)).toBe(false);
    expect(isValidNodeId(1.5)).toBe(false);
    expect(isValidNodeId(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
  });
});
