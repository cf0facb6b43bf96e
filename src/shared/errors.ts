/**
 * graph-closeness error hierarchy
 */

import type { ClosenessMapping, NodeId } from './types.js';

export class ClosenessError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ClosenessError';
  }
}

// --- Config ---

export class ConfigError extends ClosenessError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(path: string) {
    super(`Configuration not found: ${path}. Run 'gcl init' first.`);
    this.name = 'ConfigNotFoundError';
  }
}

// --- Database ---

export class DatabaseError extends ClosenessError {
  constructor(message: string, cause?: Error) {
    super(message, 'DATABASE_ERROR', cause);
    this.name = 'DatabaseError';
  }
}

export class MigrationError extends DatabaseError {
  constructor(version: number, cause?: Error) {
    super(`Migration to version ${version} failed`, cause);
    this.name = 'MigrationError';
  }
}

// --- Graph ---

export class GraphAccessError extends ClosenessError {
  constructor(message: string, cause?: Error) {
    super(message, 'GRAPH_ACCESS_ERROR', cause);
    this.name = 'GraphAccessError';
  }
}

export class InvalidEdgeError extends ClosenessError {
  constructor(message: string) {
    super(message, 'INVALID_EDGE');
    this.name = 'InvalidEdgeError';
  }
}

export class EdgeListParseError extends ClosenessError {
  constructor(
    message: string,
    public readonly filepath: string,
    public readonly line: number,
  ) {
    super(`Parse error in ${filepath}:${line}: ${message}`, 'EDGE_LIST_PARSE_ERROR');
    this.name = 'EdgeListParseError';
  }
}

// --- Routing ---

export class OracleQueryError extends ClosenessError {
  constructor(
    message: string,
    public readonly source: NodeId,
    public readonly destination: NodeId,
    cause?: Error,
  ) {
    super(
      `Shortest path query ${source} -> ${destination} failed: ${message}`,
      'ORACLE_QUERY_ERROR',
      cause,
    );
    this.name = 'OracleQueryError';
  }
}

// --- Calculation ---

export class CalculationAbortedError extends ClosenessError {
  constructor(
    public readonly partial: ClosenessMapping,
    public readonly total: number,
  ) {
    super(
      `Closeness calculation aborted after ${partial.size} of ${total} nodes`,
      'CALCULATION_ABORTED',
    );
    this.name = 'CalculationAbortedError';
  }
}

// --- Engine ---

export class NotInitializedError extends ClosenessError {
  constructor() {
    super(
      'Project is not initialized. Call initialize() or loadExisting() first.',
      'NOT_INITIALIZED',
    );
    this.name = 'NotInitializedError';
  }
}

export class RunNotFoundError extends ClosenessError {
  constructor(public readonly runId: number) {
    super(`Closeness run ${runId} does not exist`, 'RUN_NOT_FOUND');
    this.name = 'RunNotFoundError';
  }
}

/**
 * Normalize an unknown thrown value into an Error for use as a cause.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
