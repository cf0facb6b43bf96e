import type { OracleKind } from '../../shared/types.js';
import type { RoutingGraph } from '../graph/types.js';
import { DijkstraOracle } from './dijkstra-oracle.js';
import { BreadthFirstOracle } from './bfs-oracle.js';
import type { OracleFactory } from './types.js';

export const dijkstraOracleFactory: OracleFactory = (graph: RoutingGraph) =>
  new DijkstraOracle(graph);

export const breadthFirstOracleFactory: OracleFactory = (graph: RoutingGraph) =>
  new BreadthFirstOracle(graph);

export function createOracleFactory(kind: OracleKind): OracleFactory {
  switch (kind) {
    case 'dijkstra':
      return dijkstraOracleFactory;
    case 'bfs':
      return breadthFirstOracleFactory;
  }
}
