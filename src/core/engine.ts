/**
 * ClosenessEngine - Core Layer facade
 *
 * Interface Layer (CLI / MCP) accesses all functionality through this facade only.
 * Integrates Data Layer repositories with the graph, routing and centrality modules.
 */

import * as fs from 'node:fs';
import { readFile } from 'node:fs/promises';

import type { GclConfig } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/types.js';
import {
  loadConfig,
  saveConfig,
  configExists as configExistsOnDisk,
  resolveDbPath,
} from '../config/config.js';
import type {
  ComputeClosenessOutput,
  ImportOptions,
  ImportResult,
  NodeId,
  NodePolicy,
  NodeScore,
  OracleKind,
  SourceProgressEvent,
  StatusOutput,
} from '../shared/types.js';
import {
  GraphAccessError,
  NotInitializedError,
  RunNotFoundError,
  toError,
} from '../shared/errors.js';
import { DatabaseManager } from '../data/database-manager.js';
import type { ScoreInsert } from '../data/types.js';
import { MemoryGraph } from './graph/memory-graph.js';
import { parseEdgeList } from './importer/edge-list-parser.js';
import { createOracleFactory } from './routing/oracle-factory.js';
import { computeClosenessCentrality } from './centrality/closeness.js';
import { UNREACHABLE } from './routing/types.js';
import { configureLogger, createLogger, closeLogger, type Logger } from '../shared/logger.js';

export interface InitOptions {
  directed?: boolean;
  oracle?: OracleKind;
  nodePolicy?: NodePolicy;
}

export interface ComputeOptions {
  oracle?: OracleKind;
  nodePolicy?: NodePolicy;
  /** Ranking length; 0 keeps every node */
  top?: number;
  onProgress?: (event: SourceProgressEvent) => void;
  /** Persist the run (default true) */
  save?: boolean;
  signal?: AbortSignal;
}

export class ClosenessEngine {
  private config: GclConfig | null = null;
  private readonly cwd: string;
  private db: DatabaseManager | null = null;
  private readonly logger: Logger;
  private _initialized = false;

  constructor(cwd: string) {
    this.cwd = cwd;
    this.logger = createLogger('ClosenessEngine');
  }

  get initialized(): boolean {
    return this._initialized;
  }

  // --- Initialization ---

  async initialize(options: InitOptions = {}): Promise<GclConfig> {
    this.logger.info(`Initializing graph project in ${this.cwd}`);

    const config: GclConfig = {
      ...DEFAULT_CONFIG,
      graph: {
        ...DEFAULT_CONFIG.graph,
        directed: options.directed ?? DEFAULT_CONFIG.graph.directed,
      },
      closeness: {
        ...DEFAULT_CONFIG.closeness,
        oracle: options.oracle ?? DEFAULT_CONFIG.closeness.oracle,
        node_policy: options.nodePolicy ?? DEFAULT_CONFIG.closeness.node_policy,
      },
    };
    saveConfig(this.cwd, config);
    this.open(config);

    return config;
  }

  /**
   * Load an existing project (for use by createClosenessEngine).
   */
  async loadExisting(): Promise<void> {
    this.open(loadConfig(this.cwd));
  }

  async configExists(): Promise<boolean> {
    return configExistsOnDisk(this.cwd);
  }

  // --- Import ---

  async importEdges(filepath: string, options: ImportOptions = {}): Promise<ImportResult> {
    const { config, db } = this.ensureInitialized();

    const text = await readFile(filepath, 'utf-8');
    const { edges, nodes } = parseEdgeList(text, {
      filepath,
      directed: config.graph.directed,
      defaultDistance: config.graph.default_distance,
    });

    const nodesAdded = db.transaction(() => {
      if (options.replace) {
        db.edges.deleteAll();
        db.nodes.deleteAll();
      }
      const added = db.nodes.insertMany(new Set([...nodes, ...endpointsOf(edges)]));
      db.edges.insertMany(
        edges.map((e) => ({
          from_node: e.from,
          to_node: e.to,
          distance: e.distance,
          bidirectional: e.bidirectional,
        })),
      );
      return added;
    });

    this.logger.info(
      `Imported ${edges.length} edges and ${nodes.length} declared nodes from ${filepath}`,
    );

    return {
      filepath,
      edges_imported: edges.length,
      nodes_declared: nodes.length,
      nodes_added: nodesAdded,
      total_nodes: db.nodes.count(),
      total_edges: db.edges.count(),
    };
  }

  // --- Graph ---

  /**
   * Snapshot of the stored graph. Later imports do not affect it.
   */
  loadGraph(): MemoryGraph {
    const { db } = this.ensureInitialized();

    try {
      const nodes = db.nodes.findAll().map((n) => n.id);
      const edges = db.edges.findAll().map((row) => ({
        from: row.from_node,
        to: row.to_node,
        distance: row.distance,
        bidirectional: row.bidirectional === 1,
      }));
      return MemoryGraph.fromEdges(edges, nodes);
    } catch (err) {
      if (err instanceof GraphAccessError) throw err;
      throw new GraphAccessError('Failed to load graph from database', toError(err));
    }
  }

  // --- Closeness ---

  computeCloseness(options: ComputeOptions = {}): ComputeClosenessOutput {
    const { config, db } = this.ensureInitialized();

    const oracle = options.oracle ?? config.closeness.oracle;
    const nodePolicy = options.nodePolicy ?? config.closeness.node_policy;
    const top = options.top ?? config.closeness.top;

    const graph = this.loadGraph();
    const farness = new Map<NodeId, number>();
    const startedAt = new Date();
    const start = performance.now();
    const log = this.logger.child({ oracle, policy: nodePolicy });

    log.info(`Computing closeness over ${graph.nodeCount} nodes / ${graph.edgeCount} edges`);

    const scores = computeClosenessCentrality(graph, createOracleFactory(oracle), {
      nodePolicy,
      signal: options.signal,
      onSourceComplete: (event) => {
        farness.set(event.source, event.farness);
        log.debug(
          `source ${event.source} (${event.index}/${event.total}) closeness=${event.closeness} in ${event.elapsedMs.toFixed(2)}ms`,
        );
        options.onProgress?.(event);
      },
    });

    const elapsedMs = performance.now() - start;
    const ranking = rankScores(scores);

    let runId: number | null = null;
    if (options.save ?? true) {
      const rows: ScoreInsert[] = ranking.map((s) => ({
        node_id: s.node_id,
        closeness: s.closeness,
        farness: farness.get(s.node_id) ?? UNREACHABLE,
      }));
      runId = db.transaction(() =>
        db.runs.save({
          oracle,
          node_policy: nodePolicy,
          started_at: startedAt.toISOString(),
          finished_at: new Date().toISOString(),
          scores: rows,
        }),
      );
    }

    let unreachable = 0;
    for (const value of farness.values()) {
      if (value === UNREACHABLE) unreachable++;
    }

    log.info(
      `Closeness computed for ${scores.size} nodes in ${elapsedMs.toFixed(1)}ms` +
        (runId === null ? '' : ` (run ${runId})`),
    );

    return {
      run_id: runId,
      oracle,
      node_policy: nodePolicy,
      node_count: scores.size,
      unreachable_count: unreachable,
      elapsed_ms: elapsedMs,
      ranking: top > 0 ? ranking.slice(0, top) : ranking,
    };
  }

  /**
   * A stored run, shaped like a fresh computation. `elapsed_ms` is the
   * wall-clock span between the recorded start and finish.
   */
  getRun(runId: number, top?: number): ComputeClosenessOutput {
    const { config, db } = this.ensureInitialized();

    const run = db.runs.findById(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }

    const scores = db.runs.findScores(runId);
    const limit = top ?? config.closeness.top;
    const ranking = limit > 0 ? scores.slice(0, limit) : scores;

    return {
      run_id: run.id,
      oracle: run.oracle,
      node_policy: run.node_policy,
      node_count: run.node_count,
      unreachable_count: scores.filter((s) => s.farness === null).length,
      elapsed_ms: Date.parse(run.finished_at) - Date.parse(run.started_at),
      ranking: ranking.map((s) => ({ node_id: s.node_id, closeness: s.closeness })),
    };
  }

  // --- Status ---

  getStatus(): StatusOutput {
    const { config, db } = this.ensureInitialized();

    const latest = db.runs.findLatest();

    // Get DB file size
    let dbSizeBytes = 0;
    const dbPath = resolveDbPath(this.cwd);
    if (fs.existsSync(dbPath)) {
      dbSizeBytes = fs.statSync(dbPath).size;
    }

    return {
      initialized: this._initialized,
      directed: config.graph.directed,
      total_nodes: db.nodes.count(),
      total_edges: db.edges.count(),
      isolated_nodes: db.nodes.countIsolated(),
      total_runs: db.runs.count(),
      last_run: latest
        ? {
            run_id: latest.id,
            oracle: latest.oracle,
            node_policy: latest.node_policy,
            node_count: latest.node_count,
            finished_at: latest.finished_at,
          }
        : null,
      db_size_bytes: dbSizeBytes,
    };
  }

  // --- Process lifecycle ---

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }

    closeLogger();
    this._initialized = false;
  }

  // --- Internal helpers ---

  private open(config: GclConfig): void {
    this.config = config;
    configureLogger({ level: config.log.level, file: config.log.file });

    this.db = new DatabaseManager({ dbPath: resolveDbPath(this.cwd) });
    this.db.initialize();
    this._initialized = true;
  }

  private ensureInitialized(): { config: GclConfig; db: DatabaseManager } {
    if (!this._initialized || !this.db || !this.config) {
      throw new NotInitializedError();
    }
    return { config: this.config, db: this.db };
  }
}

/**
 * Highest closeness first; ties broken by ascending node id.
 */
export function rankScores(scores: Map<NodeId, number>): NodeScore[] {
  return [...scores.entries()]
    .map(([node_id, closeness]) => ({ node_id, closeness }))
    .sort((a, b) => b.closeness - a.closeness || a.node_id - b.node_id);
}

function endpointsOf(edges: Iterable<{ from: NodeId; to: NodeId }>): Set<NodeId> {
  const nodes = new Set<NodeId>();
  for (const edge of edges) {
    nodes.add(edge.from);
    nodes.add(edge.to);
  }
  return nodes;
}

export async function createClosenessEngine(cwd: string): Promise<ClosenessEngine> {
  const engine = new ClosenessEngine(cwd);
  if (configExistsOnDisk(cwd)) {
    await engine.loadExisting();
  }
  return engine;
}
