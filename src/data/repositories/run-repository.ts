import type { StatementCache } from '../statement-cache.js';
import type { RunRow, RunInsert, ScoreRow } from '../types.js';

export interface RunRepository {
  /** Stores the run and its scores; returns the run id */
  save(run: RunInsert): number;
  findById(id: number): RunRow | null;
  findLatest(): RunRow | null;
  findScores(runId: number, limit?: number): ScoreRow[];
  count(): number;
}

export function createRunRepository(cache: StatementCache): RunRepository {
  return {
    save(run: RunInsert): number {
      const runStmt = cache.get(
        'insert_run',
        `INSERT INTO closeness_runs (oracle, node_policy, node_count, started_at, finished_at)
         VALUES (?, ?, ?, ?, ?)`,
      );
      const scoreStmt = cache.get(
        'insert_score',
        `INSERT INTO closeness_scores (run_id, node_id, closeness, farness)
         VALUES (?, ?, ?, ?)`,
      );

      const info = runStmt.run(
        run.oracle,
        run.node_policy,
        run.scores.length,
        run.started_at,
        run.finished_at,
      );
      const runId = Number(info.lastInsertRowid);

      for (const score of run.scores) {
        scoreStmt.run(
          runId,
          score.node_id,
          score.closeness,
          Number.isFinite(score.farness) ? score.farness : null,
        );
      }
      return runId;
    },

    findById(id: number): RunRow | null {
      const stmt = cache.get(
        'select_run_by_id',
        'SELECT * FROM closeness_runs WHERE id = ?',
      );
      return (stmt.get(id) as RunRow | undefined) ?? null;
    },

    findLatest(): RunRow | null {
      const stmt = cache.get(
        'select_latest_run',
        'SELECT * FROM closeness_runs ORDER BY id DESC LIMIT 1',
      );
      return (stmt.get() as RunRow | undefined) ?? null;
    },

    findScores(runId: number, limit?: number): ScoreRow[] {
      const stmt = cache.get(
        'select_scores_by_run',
        `SELECT * FROM closeness_scores WHERE run_id = ?
         ORDER BY closeness DESC, node_id ASC LIMIT ?`,
      );
      // LIMIT -1 は無制限
      return stmt.all(runId, limit ?? -1) as ScoreRow[];
    },

    count(): number {
      const stmt = cache.get(
        'count_runs',
        'SELECT COUNT(*) AS cnt FROM closeness_runs',
      );
      return (stmt.get() as { cnt: number }).cnt;
    },
  };
}
