/**
 * Shared type definitions used across all layers
 */

// --- Graph ---

/** Non-negative integer identifying a vertex */
export type NodeId = number;

export interface Edge {
  from: NodeId;
  to: NodeId;
  /** Non-negative, finite */
  distance: number;
  /** Traversable in both directions */
  bidirectional: boolean;
}

/** Node id to closeness score */
export type ClosenessMapping = Map<NodeId, number>;

export type NodePolicy = 'edges' | 'all';

export type OracleKind = 'dijkstra' | 'bfs';

// --- Routing ---

export interface PathResult {
  reachable: boolean;
  /** UNREACHABLE when reachable is false */
  distance: number;
  /** Source to destination inclusive; empty when unreachable */
  nodes: NodeId[];
}

// --- Calculation ---

export interface SourceProgressEvent {
  source: NodeId;
  closeness: number;
  /** Infinity when some destination is unreachable */
  farness: number;
  elapsedMs: number;
  /** 1-based */
  index: number;
  total: number;
}

// --- Import ---

export interface ImportOptions {
  replace?: boolean;
}

export interface ImportResult {
  filepath: string;
  edges_imported: number;
  /** Ids given on single-id lines */
  nodes_declared: number;
  nodes_added: number;
  total_nodes: number;
  total_edges: number;
}

// --- Closeness ---

export interface ComputeClosenessInput {
  oracle?: OracleKind;
  node_policy?: NodePolicy;
  top?: number;
}

export interface NodeScore {
  node_id: NodeId;
  closeness: number;
}

export interface ComputeClosenessOutput {
  run_id: number | null;
  oracle: OracleKind;
  node_policy: NodePolicy;
  node_count: number;
  unreachable_count: number;
  elapsed_ms: number;
  /** Highest closeness first, ties by node id */
  ranking: NodeScore[];
}

// --- Status ---

export interface LastRunSummary {
  run_id: number;
  oracle: OracleKind;
  node_policy: NodePolicy;
  node_count: number;
  finished_at: string;
}

export interface StatusOutput {
  initialized: boolean;
  directed: boolean;
  total_nodes: number;
  total_edges: number;
  isolated_nodes: number;
  total_runs: number;
  last_run: LastRunSummary | null;
  db_size_bytes: number;
}
