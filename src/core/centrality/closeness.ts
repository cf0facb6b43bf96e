/**
 * Freeman closeness centrality
 *
 * closeness(s) = (n - 1) / farness(s), where farness(s) sums the shortest
 * path distances from s to every other node of the node set. A single
 * unreachable destination makes farness infinite and closeness 0.
 *
 * Freeman, L. C. (1977). A set of measures of centrality based on
 * betweenness. Sociometry 40, 35-41.
 */

import type {
  ClosenessMapping,
  NodeId,
  NodePolicy,
  SourceProgressEvent,
} from '../../shared/types.js';
import {
  CalculationAbortedError,
  ClosenessError,
  OracleQueryError,
  toError,
} from '../../shared/errors.js';
import type { RoutingGraph } from '../graph/types.js';
import { UNREACHABLE, type OracleFactory, type ShortestPathOracle } from '../routing/types.js';
import { dijkstraOracleFactory } from '../routing/oracle-factory.js';
import { extractNodeSet } from './node-set.js';

export interface ClosenessOptions {
  nodePolicy?: NodePolicy;
  /** Called once per source after its score is stored */
  onSourceComplete?: (event: SourceProgressEvent) => void;
  /** Checked before each source; completed sources survive an abort */
  signal?: AbortSignal;
}

export function computeClosenessCentrality<G extends RoutingGraph>(
  graph: G,
  oracleFactory: OracleFactory<G> = dijkstraOracleFactory,
  options: ClosenessOptions = {},
): ClosenessMapping {
  const result: ClosenessMapping = new Map();
  const nodeSet = extractNodeSet(graph, options.nodePolicy);
  const n = nodeSet.size;

  if (n <= 1) {
    return result;
  }

  const oracle = oracleFactory(graph);
  let index = 0;

  for (const source of nodeSet) {
    if (options.signal?.aborted) {
      throw new CalculationAbortedError(result, n);
    }

    const start = performance.now();
    const farness = computeFarness(oracle, source, nodeSet);
    const closeness = toCloseness(n, farness);
    result.set(source, closeness);

    index++;
    options.onSourceComplete?.({
      source,
      closeness,
      farness,
      elapsedMs: performance.now() - start,
      index,
      total: n,
    });
  }

  return result;
}

/**
 * Calculate closeness with the default Dijkstra oracle.
 */
export function calculateWithDijkstra(
  graph: RoutingGraph,
  options: ClosenessOptions = {},
): ClosenessMapping {
  return computeClosenessCentrality(graph, dijkstraOracleFactory, options);
}

/**
 * Sum of distances from source to every other node. Returns UNREACHABLE
 * as soon as one destination has no path; the remaining destinations are
 * not queried.
 */
export function computeFarness(
  oracle: ShortestPathOracle,
  source: NodeId,
  nodeSet: Iterable<NodeId>,
): number {
  let farness = 0;

  for (const destination of nodeSet) {
    if (destination === source) continue;

    const path = queryOracle(oracle, source, destination);
    farness += path.reachable ? path.distance : UNREACHABLE;

    if (farness === UNREACHABLE) {
      return UNREACHABLE;
    }
  }

  return farness;
}

export function toCloseness(nodeCount: number, farness: number): number {
  if (farness === UNREACHABLE) return 0;
  if (farness === 0) return Number.POSITIVE_INFINITY;
  return (nodeCount - 1) / farness;
}

function queryOracle(
  oracle: ShortestPathOracle,
  source: NodeId,
  destination: NodeId,
): { reachable: boolean; distance: number } {
  try {
    oracle.reset();
    return oracle.shortestPath(source, destination);
  } catch (err) {
    if (err instanceof ClosenessError) throw err;
    const cause = toError(err);
    throw new OracleQueryError(cause.message, source, destination, cause);
  }
}
