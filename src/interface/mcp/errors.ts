/**
 * MCP error code definitions and error conversion
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import {
  ClosenessError,
  DatabaseError,
  GraphAccessError,
  OracleQueryError,
} from '../../shared/errors.js';

export const GCL_ERROR = {
  GRAPH_ACCESS: -32001,
  ORACLE_QUERY: -32002,
  DATABASE_ERROR: -32003,
} as const;

export function toMcpError(error: unknown): McpError {
  if (error instanceof GraphAccessError) {
    return new McpError(
      GCL_ERROR.GRAPH_ACCESS as ErrorCode,
      `Graph access failed: ${error.message}`,
    );
  }

  if (error instanceof OracleQueryError) {
    return new McpError(GCL_ERROR.ORACLE_QUERY as ErrorCode, error.message, {
      source: error.source,
      destination: error.destination,
    });
  }

  if (error instanceof DatabaseError) {
    return new McpError(
      GCL_ERROR.DATABASE_ERROR as ErrorCode,
      `Database error: ${error.message}`,
    );
  }

  if (error instanceof ClosenessError) {
    return new McpError(ErrorCode.InternalError, error.message, { code: error.code });
  }

  return new McpError(
    ErrorCode.InternalError,
    error instanceof Error ? error.message : 'Unknown error',
  );
}
