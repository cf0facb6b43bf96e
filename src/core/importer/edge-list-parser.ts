/**
 * Edge list parser
 *
 * One edge per line: `from to [distance]`, separated by whitespace or
 * commas. A line holding a single id declares a node, which stays isolated
 * unless some edge touches it. `#` starts a comment; blank lines are skipped.
 */

import type { Edge, NodeId } from '../../shared/types.js';
import { EdgeListParseError } from '../../shared/errors.js';

export interface ParseEdgeListOptions {
  /** Used in error messages */
  filepath?: string;
  /** Edges are one-way when true */
  directed?: boolean;
  /** Distance for lines without a third column */
  defaultDistance?: number;
}

const NODE_ID_PATTERN = /^\d+$/;
const FIELD_SEPARATOR = /[\s,]+/;

export interface ParsedEdgeList {
  edges: Edge[];
  /** Ids declared on single-id lines, in order of first appearance */
  nodes: NodeId[];
}

export function parseEdgeList(
  text: string,
  options: ParseEdgeListOptions = {},
): ParsedEdgeList {
  const filepath = options.filepath ?? '<input>';
  const bidirectional = !(options.directed ?? false);
  const defaultDistance = options.defaultDistance ?? 1;
  const edges: Edge[] = [];
  const nodes = new Set<NodeId>();

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const content = stripComment(lines[i] ?? '').trim();
    if (content === '') continue;

    const fields = content.split(FIELD_SEPARATOR);
    if (fields.length === 1) {
      nodes.add(parseNodeId(fields[0] ?? '', filepath, lineNo));
      continue;
    }
    if (fields.length > 3) {
      throw new EdgeListParseError(
        `expected 'from to [distance]' or a single node id, got ${fields.length} field(s)`,
        filepath,
        lineNo,
      );
    }

    const [fromField = '', toField = '', distanceField] = fields;
    edges.push({
      from: parseNodeId(fromField, filepath, lineNo),
      to: parseNodeId(toField, filepath, lineNo),
      distance:
        distanceField === undefined
          ? defaultDistance
          : parseDistance(distanceField, filepath, lineNo),
      bidirectional,
    });
  }

  return { edges, nodes: [...nodes] };
}

function stripComment(line: string): string {
  const hash = line.indexOf('#');
  return hash === -1 ? line : line.slice(0, hash);
}

function parseNodeId(field: string, filepath: string, line: number): number {
  const value = Number(field);
  if (!NODE_ID_PATTERN.test(field) || !Number.isSafeInteger(value)) {
    throw new EdgeListParseError(
      `invalid node id '${field}', expected a non-negative integer`,
      filepath,
      line,
    );
  }
  return value;
}

function parseDistance(field: string, filepath: string, line: number): number {
  const value = Number(field);
  if (field === '' || !Number.isFinite(value) || value < 0) {
    throw new EdgeListParseError(
      `invalid distance '${field}', expected a finite non-negative number`,
      filepath,
      line,
    );
  }
  return value;
}
