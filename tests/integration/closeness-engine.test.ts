/**
 * Integration tests: init -> import -> closeness -> status on a real project directory
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ClosenessEngine, createClosenessEngine } from '../../src/core/engine.js';
import { DatabaseManager } from '../../src/data/database-manager.js';
import { resolveDbPath } from '../../src/config/config.js';
import { EdgeListParseError, NotInitializedError, RunNotFoundError } from '../../src/shared/errors.js';

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'gcl-engine-test-'));
}

describe('ClosenessEngine - integration', () => {
  let tmpDir: string;
  let engine: ClosenessEngine;

  function writeEdges(name: string, lines: string[]): string {
    const filepath = path.join(tmpDir, name);
    fs.writeFileSync(filepath, lines.join('\n') + '\n', 'utf-8');
    return filepath;
  }

  beforeEach(() => {
    tmpDir = createTempDir();
    engine = new ClosenessEngine(tmpDir);
  });

  afterEach(async () => {
    await engine.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('ranks the middle of a path first', async () => {
    await engine.initialize();
    await engine.importEdges(writeEdges('path.txt', ['0 1', '1 2']));

    const result = engine.computeCloseness();

    expect(result.run_id).toBe(1);
    expect(result.node_count).toBe(3);
    expect(result.unreachable_count).toBe(0);
    expect(result.ranking.map((s) => s.node_id)).toEqual([1, 0, 2]);
    expect(result.ranking[0]!.closeness).toBe(1);
    expect(result.ranking[1]!.closeness).toBeCloseTo(2 / 3);
    expect(result.ranking[2]!.closeness).toBeCloseTo(2 / 3);
  });

  it('reports import counts', async () => {
    await engine.initialize();

    const first = await engine.importEdges(writeEdges('a.txt', ['0 1', '1 2']));
    expect(first).toMatchObject({
      edges_imported: 2,
      nodes_declared: 0,
      nodes_added: 3,
      total_nodes: 3,
      total_edges: 2,
    });

    const second = await engine.importEdges(writeEdges('b.txt', ['2 3 0.5']));
    expect(second).toMatchObject({
      edges_imported: 1,
      nodes_added: 1,
      total_nodes: 4,
      total_edges: 3,
    });
  });

  it('imports single-id lines as isolated nodes', async () => {
    await engine.initialize({ nodePolicy: 'all' });

    const imported = await engine.importEdges(writeEdges('island.txt', ['0 1', '5']));
    expect(imported).toMatchObject({
      edges_imported: 1,
      nodes_declared: 1,
      nodes_added: 3,
      total_nodes: 3,
      total_edges: 1,
    });
    expect(engine.getStatus().isolated_nodes).toBe(1);

    // node 5 is unreachable from 0 and 1, and reaches neither
    const all = engine.computeCloseness();
    expect(all.node_count).toBe(3);
    expect(all.unreachable_count).toBe(3);
    expect(all.ranking).toEqual([
      { node_id: 0, closeness: 0 },
      { node_id: 1, closeness: 0 },
      { node_id: 5, closeness: 0 },
    ]);

    const edgesOnly = engine.computeCloseness({ nodePolicy: 'edges' });
    expect(edgesOnly.node_count).toBe(2);
    expect(edgesOnly.ranking).toEqual([
      { node_id: 0, closeness: 1 },
      { node_id: 1, closeness: 1 },
    ]);
  });

  it('does not count a declared node twice when an edge also names it', async () => {
    await engine.initialize();

    const imported = await engine.importEdges(writeEdges('both.txt', ['2', '2 3']));

    expect(imported.nodes_added).toBe(2);
    expect(engine.getStatus().isolated_nodes).toBe(0);
  });

  it('replaces the stored graph on request', async () => {
    await engine.initialize();
    await engine.importEdges(writeEdges('a.txt', ['0 1', '1 2']));

    const result = await engine.importEdges(writeEdges('b.txt', ['7 8']), { replace: true });

    expect(result.total_nodes).toBe(2);
    expect(result.total_edges).toBe(1);
    expect([...engine.loadGraph().allNodes()]).toEqual([7, 8]);
  });

  it('keeps the database unchanged when the edge list is malformed', async () => {
    await engine.initialize();
    await engine.importEdges(writeEdges('good.txt', ['0 1']));

    await expect(
      engine.importEdges(writeEdges('bad.txt', ['1 2', 'x 3'])),
    ).rejects.toBeInstanceOf(EdgeListParseError);

    expect(engine.getStatus().total_edges).toBe(1);
  });

  it('uses weighted distances with dijkstra and hops with bfs', async () => {
    await engine.initialize();
    await engine.importEdges(writeEdges('weighted.txt', ['0 1 5', '1 2 5']));

    const weighted = engine.computeCloseness({ oracle: 'dijkstra' });
    const hops = engine.computeCloseness({ oracle: 'bfs' });

    // farness(1) = 5 + 5 with weights, 1 + 1 in hops
    expect(weighted.ranking[0]).toEqual({ node_id: 1, closeness: 0.2 });
    expect(hops.ranking[0]).toEqual({ node_id: 1, closeness: 1 });
  });

  it('imports one-way edges in a directed project', async () => {
    await engine.initialize({ directed: true });
    await engine.importEdges(writeEdges('chain.txt', ['0 1', '1 2']));

    const result = engine.computeCloseness();

    // only 0 reaches every node
    expect(result.unreachable_count).toBe(2);
    expect(result.ranking).toEqual([
      { node_id: 0, closeness: 2 / 3 },
      { node_id: 1, closeness: 0 },
      { node_id: 2, closeness: 0 },
    ]);
  });

  it('scores every node 0 when the graph is disconnected', async () => {
    await engine.initialize();
    await engine.importEdges(writeEdges('split.txt', ['3 2', '1 0']));

    const result = engine.computeCloseness();

    expect(result.unreachable_count).toBe(4);
    expect(result.ranking).toEqual([
      { node_id: 0, closeness: 0 },
      { node_id: 1, closeness: 0 },
      { node_id: 2, closeness: 0 },
      { node_id: 3, closeness: 0 },
    ]);
  });

  it('truncates the ranking to top', async () => {
    await engine.initialize();
    await engine.importEdges(writeEdges('path.txt', ['0 1', '1 2', '2 3']));

    const result = engine.computeCloseness({ top: 2 });

    expect(result.node_count).toBe(4);
    expect(result.ranking).toHaveLength(2);
  });

  it('does not store the run when save is false', async () => {
    await engine.initialize();
    await engine.importEdges(writeEdges('path.txt', ['0 1']));

    const result = engine.computeCloseness({ save: false });

    expect(result.run_id).toBeNull();
    expect(engine.getStatus().total_runs).toBe(0);
  });

  it('tags run log lines with the oracle and node policy', async () => {
    await engine.initialize();
    await engine.importEdges(writeEdges('path.txt', ['0 1', '1 2']));
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    try {
      engine.computeCloseness({ oracle: 'bfs' });
      const lines = stderr.mock.calls.map(([chunk]) => String(chunk));

      expect(lines.some((line) =>
        line.endsWith(' INFO  [ClosenessEngine oracle=bfs policy=edges] Computing closeness over 3 nodes / 2 edges\n'),
      )).toBe(true);
    } finally {
      stderr.mockRestore();
    }
  });

  it('reports progress for every source', async () => {
    await engine.initialize();
    await engine.importEdges(writeEdges('path.txt', ['0 1', '1 2']));
    const seen: number[] = [];

    engine.computeCloseness({ onProgress: (event) => seen.push(event.source) });

    expect(seen).toEqual([0, 1, 2]);
  });

  it('persists runs and scores across reopen', async () => {
    await engine.initialize({ oracle: 'bfs' });
    await engine.importEdges(writeEdges('split.txt', ['0 1', '2 3']));
    const { run_id } = engine.computeCloseness();
    await engine.close();

    engine = await createClosenessEngine(tmpDir);
    const status = engine.getStatus();

    expect(status.total_nodes).toBe(4);
    expect(status.total_edges).toBe(2);
    expect(status.isolated_nodes).toBe(0);
    expect(status.total_runs).toBe(1);
    expect(status.last_run).toMatchObject({
      run_id,
      oracle: 'bfs',
      node_policy: 'edges',
      node_count: 4,
    });
    expect(status.db_size_bytes).toBeGreaterThan(0);
    await engine.close();

    const db = new DatabaseManager({ dbPath: resolveDbPath(tmpDir) });
    db.initialize();
    try {
      const scores = db.runs.findScores(run_id ?? -1);
      expect(scores.map((s) => [s.node_id, s.closeness, s.farness])).toEqual([
        [0, 0, null],
        [1, 0, null],
        [2, 0, null],
        [3, 0, null],
      ]);
    } finally {
      db.close();
    }
  });

  it('reads a stored run back in ranking order', async () => {
    await engine.initialize();
    await engine.importEdges(writeEdges('path.txt', ['0 1', '1 2']));
    const computed = engine.computeCloseness();
    await engine.close();

    engine = await createClosenessEngine(tmpDir);
    const stored = engine.getRun(computed.run_id ?? -1, 2);

    expect(stored).toMatchObject({
      run_id: computed.run_id,
      oracle: 'dijkstra',
      node_policy: 'edges',
      node_count: 3,
      unreachable_count: 0,
    });
    expect(stored.ranking).toEqual([
      { node_id: 1, closeness: 1 },
      { node_id: 0, closeness: 2 / 3 },
    ]);
    expect(stored.elapsed_ms).toBeGreaterThanOrEqual(0);
  });

  it('counts unreachable scores of a stored run', async () => {
    await engine.initialize();
    await engine.importEdges(writeEdges('split.txt', ['0 1', '2 3']));
    const { run_id } = engine.computeCloseness();

    const stored = engine.getRun(run_id ?? -1, 0);

    expect(stored.unreachable_count).toBe(4);
    expect(stored.ranking).toHaveLength(4);
  });

  it('rejects an unknown run id', async () => {
    await engine.initialize();

    expect(() => engine.getRun(9)).toThrow(RunNotFoundError);
  });

  it('rejects use before initialization', async () => {
    engine = await createClosenessEngine(tmpDir);

    expect(engine.initialized).toBe(false);
    expect(() => engine.getStatus()).toThrow(NotInitializedError);
    expect(() => engine.computeCloseness()).toThrow(NotInitializedError);
  });
});
