/**
 * 3-layer error display: Error / Cause / Hint
 */

import pc from 'picocolors';
import { formatError, formatHint } from './formatter.js';
import { printJsonError } from './json-output.js';
import type { GlobalOptions } from '../utils/global-options.js';
import { ClosenessError } from '../../../shared/errors.js';

export interface ErrorDisplay {
  message: string;
  code?: string;
  cause?: string;
  hint?: string;
  stack?: string;
}

export function toErrorDisplay(error: unknown): ErrorDisplay {
  if (error instanceof ClosenessError) {
    return {
      message: error.message,
      code: error.code,
      cause: error.cause?.message,
      hint: getHintForCode(error.code),
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return {
      message: error.message,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

export function getHintForCode(code: string): string | undefined {
  switch (code) {
    case 'CONFIG_ERROR':
      return 'Check your .gcl/config.json file.';
    case 'NOT_INITIALIZED':
      return "Run 'gcl init' first.";
    case 'DATABASE_ERROR':
      return "Delete .gcl/graph.db and run 'gcl import --replace <file>' to rebuild it.";
    case 'EDGE_LIST_PARSE_ERROR':
      return "Each line must read 'from to [distance]' or a single node id, with non-negative integer ids.";
    case 'INVALID_EDGE':
      return 'Node ids must be non-negative integers and distances finite and non-negative.';
    case 'GRAPH_ACCESS_ERROR':
      return "Run 'gcl status' to check the stored graph.";
    case 'ORACLE_QUERY_ERROR':
      return 'Retry with --oracle bfs to rule out a weighted routing problem.';
    case 'RUN_NOT_FOUND':
      return "Run 'gcl status' to see the latest run id.";
    case 'CALCULATION_ABORTED':
      return 'The run was cancelled; scores of completed nodes were not saved.';
    default:
      return undefined;
  }
}

export function renderError(
  error: ErrorDisplay,
  globals: GlobalOptions,
): void {
  if (globals.json) {
    printJsonError({
      message: error.message,
      code: error.code,
      cause: error.cause,
      hint: error.hint,
    });
    return;
  }

  const lines: string[] = [];
  lines.push(formatError(error.message));

  if (error.cause) {
    lines.push(`  Cause: ${error.cause}`);
  }

  if (error.hint) {
    lines.push(`  ${formatHint(error.hint)}`);
  }

  if (globals.verbose && error.stack) {
    lines.push('');
    lines.push(pc.dim(error.stack));
  }

  process.stderr.write(lines.join('\n') + '\n');
}

export function handleCommandError(error: unknown, globals: GlobalOptions): never {
  renderError(toErrorDisplay(error), globals);
  process.exit(1);
}
