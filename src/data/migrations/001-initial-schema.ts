import type { Migration } from '../types.js';

const INITIAL_SCHEMA_SQL = `
-- schema_version
CREATE TABLE IF NOT EXISTS schema_version (
    version     INTEGER PRIMARY KEY,
    applied_at  TEXT    NOT NULL,
    description TEXT
);

-- nodes
CREATE TABLE IF NOT EXISTS nodes (
    id          INTEGER PRIMARY KEY CHECK(id >= 0),
    created_at  TEXT    NOT NULL
);

-- edges
CREATE TABLE IF NOT EXISTS edges (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    from_node       INTEGER NOT NULL
                            REFERENCES nodes(id) ON DELETE CASCADE,
    to_node         INTEGER NOT NULL
                            REFERENCES nodes(id) ON DELETE CASCADE,
    distance        REAL    NOT NULL CHECK(distance >= 0),
    bidirectional   INTEGER NOT NULL DEFAULT 1
                            CHECK(bidirectional IN (0, 1)),
    created_at      TEXT    NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_edges_from ON edges(from_node);
CREATE INDEX IF NOT EXISTS idx_edges_to ON edges(to_node);

-- closeness_runs
CREATE TABLE IF NOT EXISTS closeness_runs (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    oracle      TEXT    NOT NULL CHECK(oracle IN ('dijkstra','bfs')),
    node_policy TEXT    NOT NULL CHECK(node_policy IN ('edges','all')),
    node_count  INTEGER NOT NULL,
    started_at  TEXT    NOT NULL,
    finished_at TEXT    NOT NULL
);

-- closeness_scores (farness NULL = unreachable)
CREATE TABLE IF NOT EXISTS closeness_scores (
    run_id      INTEGER NOT NULL
                        REFERENCES closeness_runs(id) ON DELETE CASCADE,
    node_id     INTEGER NOT NULL,
    closeness   REAL    NOT NULL,
    farness     REAL,
    PRIMARY KEY (run_id, node_id)
);

CREATE INDEX IF NOT EXISTS idx_scores_closeness ON closeness_scores(run_id, closeness DESC);
`;

export const migration001: Migration = {
  version: 1,
  description: '初期スキーマ作成',
  up: (db) => {
    db.exec(INITIAL_SCHEMA_SQL);
    db.prepare(
      'INSERT INTO schema_version (version, applied_at, description) VALUES (?, ?, ?)',
    ).run(1, new Date().toISOString(), '初期スキーマ作成');
  },
};
