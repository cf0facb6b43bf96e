/**
 * Tests for gcl_compute_closeness MCP tool
 */

import { describe, it, expect, vi } from 'vitest';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import { registerComputeClosenessTool } from './gcl-compute-closeness.js';
import { GraphAccessError, OracleQueryError } from '../../../shared/errors.js';
import { GCL_ERROR } from '../errors.js';
import {
  createMockEngine,
  captureToolHandler,
  makeSampleClosenessOutput,
  parseToolText,
} from './__test-helpers.js';

describe('gcl_compute_closeness', () => {
  function setup() {
    const sampleOutput = makeSampleClosenessOutput();
    const engine = createMockEngine({
      computeCloseness: vi.fn().mockReturnValue(sampleOutput),
    });
    const handler = captureToolHandler(registerComputeClosenessTool, engine);
    return { engine, handler, sampleOutput };
  }

  it('returns MCP response format { content: [{ type, text }] }', async () => {
    const { handler } = setup();

    const result = (await handler({})) as {
      content: Array<{ type: string; text: string }>;
    };

    expect(result.content).toHaveLength(1);
    expect(result.content[0]!.type).toBe('text');
  });

  it('returns the ranking as JSON', async () => {
    const { handler } = setup();

    const parsed = parseToolText(await handler({})) as {
      node_count: number;
      run_id: number;
      ranking: Array<{ node_id: number; closeness: number }>;
    };

    expect(parsed.node_count).toBe(3);
    expect(parsed.run_id).toBe(4);
    expect(parsed.ranking.map((s) => s.node_id)).toEqual([1, 0, 2]);
    expect(parsed.ranking[0]!.closeness).toBe(1);
  });

  it('writes infinite closeness as the string "Infinity"', async () => {
    const engine = createMockEngine({
      computeCloseness: vi.fn().mockReturnValue({
        ...makeSampleClosenessOutput(),
        ranking: [{ node_id: 0, closeness: Number.POSITIVE_INFINITY }],
      }),
    });
    const handler = captureToolHandler(registerComputeClosenessTool, engine);

    const parsed = parseToolText(await handler({})) as {
      ranking: Array<{ closeness: unknown }>;
    };
    expect(parsed.ranking[0]!.closeness).toBe('Infinity');
  });

  it('maps snake_case input onto engine options', async () => {
    const { engine, handler } = setup();

    await handler({ oracle: 'bfs', node_policy: 'all', top: 5 });

    expect(engine.computeCloseness).toHaveBeenCalledWith({
      oracle: 'bfs',
      nodePolicy: 'all',
      top: 5,
    });
  });

  it('leaves omitted options to the project config', async () => {
    const { engine, handler } = setup();

    await handler({});

    expect(engine.computeCloseness).toHaveBeenCalledWith({
      oracle: undefined,
      nodePolicy: undefined,
      top: undefined,
    });
  });

  it('throws McpError with ORACLE_QUERY for OracleQueryError', async () => {
    const engine = createMockEngine({
      computeCloseness: vi.fn().mockImplementation(() => {
        throw new OracleQueryError('unknown destination node 9', 0, 9);
      }),
    });
    const handler = captureToolHandler(registerComputeClosenessTool, engine);

    try {
      await handler({});
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(McpError);
      expect((error as McpError).code).toBe(GCL_ERROR.ORACLE_QUERY);
    }
  });

  it('throws McpError with GRAPH_ACCESS for GraphAccessError', async () => {
    const engine = createMockEngine({
      computeCloseness: vi.fn().mockImplementation(() => {
        throw new GraphAccessError('Failed to load graph from database');
      }),
    });
    const handler = captureToolHandler(registerComputeClosenessTool, engine);

    await expect(handler({})).rejects.toMatchObject({ code: GCL_ERROR.GRAPH_ACCESS });
  });
});
