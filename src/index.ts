/**
 * graph-closeness public API
 */

export {
  computeClosenessCentrality,
  calculateWithDijkstra,
  computeFarness,
  toCloseness,
  type ClosenessOptions,
} from './core/centrality/closeness.js';
export { extractNodeSet } from './core/centrality/node-set.js';
export { MemoryGraph, isValidNodeId, type AddEdgeOptions } from './core/graph/memory-graph.js';
export type { EdgeSource, RoutingGraph } from './core/graph/types.js';
export { DijkstraOracle } from './core/routing/dijkstra-oracle.js';
export { BreadthFirstOracle } from './core/routing/bfs-oracle.js';
export {
  createOracleFactory,
  dijkstraOracleFactory,
  breadthFirstOracleFactory,
} from './core/routing/oracle-factory.js';
export {
  UNREACHABLE,
  type OracleFactory,
  type ShortestPathOracle,
} from './core/routing/types.js';
export {
  parseEdgeList,
  type ParseEdgeListOptions,
  type ParsedEdgeList,
} from './core/importer/edge-list-parser.js';
export {
  ClosenessEngine,
  createClosenessEngine,
  rankScores,
  type ComputeOptions,
  type InitOptions,
} from './core/engine.js';
export * from './shared/errors.js';
export type * from './shared/types.js';
