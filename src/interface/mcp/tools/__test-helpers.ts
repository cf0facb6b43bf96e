/**
 * Shared test helpers for MCP tool tests
 */

import { vi } from 'vitest';
import type { ClosenessEngine } from '../../../core/engine.js';
import type { ComputeClosenessOutput, StatusOutput } from '../../../shared/types.js';

/**
 * Create a mock ClosenessEngine with the methods tools call as vi.fn()
 */
export function createMockEngine(
  overrides?: Partial<Record<keyof ClosenessEngine, unknown>>,
): ClosenessEngine {
  const engine = {
    computeCloseness: vi.fn(),
    getRun: vi.fn(),
    getStatus: vi.fn(),
    importEdges: vi.fn(),
    loadGraph: vi.fn(),
    initialize: vi.fn(),
    loadExisting: vi.fn(),
    configExists: vi.fn(),
    close: vi.fn(),
    ...overrides,
  } as unknown as ClosenessEngine;

  return engine;
}

type ToolHandler = (input: Record<string, unknown>) => Promise<unknown>;

/**
 * Capture a tool handler registered via server.tool().
 *
 * Creates a mock McpServer, calls the register function, and returns
 * the async handler callback for direct invocation in tests.
 */
export function captureToolHandler(
  registerFn: (server: never, engine: ClosenessEngine) => void,
  engine: ClosenessEngine,
): ToolHandler {
  let captured: ToolHandler | null = null;

  const mockServer = {
    tool: (
      _name: string,
      _description: string,
      schemaOrHandler: unknown,
      handler?: unknown,
    ) => {
      // server.tool(name, description, schema, handler)
      // server.tool(name, description, handler)
      if (typeof handler === 'function') {
        captured = handler as ToolHandler;
      } else if (typeof schemaOrHandler === 'function') {
        captured = schemaOrHandler as ToolHandler;
      }
    },
  };

  registerFn(mockServer as never, engine);

  if (!captured) {
    throw new Error('Tool handler was not registered');
  }

  return captured;
}

export function parseToolText(result: unknown): unknown {
  const { content } = result as { content: Array<{ type: string; text: string }> };
  return JSON.parse(content[0]!.text);
}

// --- Sample response factories ---

export function makeSampleClosenessOutput(): ComputeClosenessOutput {
  return {
    run_id: 4,
    oracle: 'dijkstra',
    node_policy: 'edges',
    node_count: 3,
    unreachable_count: 0,
    elapsed_ms: 1.5,
    ranking: [
      { node_id: 1, closeness: 1 },
      { node_id: 0, closeness: 2 / 3 },
      { node_id: 2, closeness: 2 / 3 },
    ],
  };
}

export function makeSampleStatusOutput(): StatusOutput {
  return {
    initialized: true,
    directed: false,
    total_nodes: 3,
    total_edges: 2,
    isolated_nodes: 0,
    total_runs: 1,
    last_run: {
      run_id: 4,
      oracle: 'dijkstra',
      node_policy: 'edges',
      node_count: 3,
      finished_at: '2026-01-01T00:00:00.000Z',
    },
    db_size_bytes: 8192,
  };
}
