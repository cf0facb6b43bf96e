import type { StatementCache } from '../statement-cache.js';
import type { EdgeRow, EdgeInsert } from '../types.js';

export interface EdgeRepository {
  insertMany(edges: EdgeInsert[]): number;
  findAll(): EdgeRow[];
  count(): number;
  deleteAll(): void;
}

export function createEdgeRepository(cache: StatementCache): EdgeRepository {
  return {
    insertMany(edges: EdgeInsert[]): number {
      const stmt = cache.get(
        'insert_edge',
        `INSERT INTO edges (from_node, to_node, distance, bidirectional, created_at)
         VALUES (?, ?, ?, ?, ?)`,
      );
      const now = new Date().toISOString();
      for (const edge of edges) {
        stmt.run(
          edge.from_node,
          edge.to_node,
          edge.distance,
          edge.bidirectional ? 1 : 0,
          now,
        );
      }
      return edges.length;
    },

    findAll(): EdgeRow[] {
      const stmt = cache.get(
        'select_all_edges',
        'SELECT * FROM edges ORDER BY id ASC',
      );
      return stmt.all() as EdgeRow[];
    },

    count(): number {
      const stmt = cache.get(
        'count_edges',
        'SELECT COUNT(*) AS cnt FROM edges',
      );
      return (stmt.get() as { cnt: number }).cnt;
    },

    deleteAll(): void {
      const stmt = cache.get('delete_all_edges', 'DELETE FROM edges');
      stmt.run();
    },
  };
}
