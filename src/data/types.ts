/**
 * Data Layer 内部型定義
 * SQLite テーブルとの直接的なマッピング型
 */

import type { NodePolicy, OracleKind } from '../shared/types.js';

/** ISO 8601形式の日時文字列 */
export type ISODateString = string;

// --- Node ---

export interface NodeRow {
  id: number;
  created_at: ISODateString;
}

// --- Edge ---

export interface EdgeRow {
  id: number;
  from_node: number;
  to_node: number;
  distance: number;
  bidirectional: number; // 0 or 1 in SQLite
  created_at: ISODateString;
}

export interface EdgeInsert {
  from_node: number;
  to_node: number;
  distance: number;
  bidirectional: boolean;
}

// --- Closeness Run ---

export interface RunRow {
  id: number;
  oracle: OracleKind;
  node_policy: NodePolicy;
  node_count: number;
  started_at: ISODateString;
  finished_at: ISODateString;
}

export interface RunInsert {
  oracle: OracleKind;
  node_policy: NodePolicy;
  started_at: ISODateString;
  finished_at: ISODateString;
  scores: ScoreInsert[];
}

export interface ScoreRow {
  run_id: number;
  node_id: number;
  closeness: number;
  /** NULL は到達不能（無限大） */
  farness: number | null;
}

export interface ScoreInsert {
  node_id: number;
  closeness: number;
  farness: number;
}

// --- Migration ---

export interface Migration {
  version: number;
  description: string;
  up: (db: import('better-sqlite3').Database) => void;
}
