import type { StatementCache } from '../statement-cache.js';
import type { NodeRow } from '../types.js';

export interface NodeRepository {
  /** Returns the number of ids that were not present yet */
  insertMany(ids: Iterable<number>): number;
  findAll(): NodeRow[];
  count(): number;
  countIsolated(): number;
  deleteAll(): void;
}

export function createNodeRepository(cache: StatementCache): NodeRepository {
  return {
    insertMany(ids: Iterable<number>): number {
      const stmt = cache.get(
        'insert_node',
        'INSERT OR IGNORE INTO nodes (id, created_at) VALUES (?, ?)',
      );
      const now = new Date().toISOString();
      let added = 0;
      for (const id of ids) {
        added += stmt.run(id, now).changes;
      }
      return added;
    },

    findAll(): NodeRow[] {
      const stmt = cache.get(
        'select_all_nodes',
        'SELECT * FROM nodes ORDER BY id ASC',
      );
      return stmt.all() as NodeRow[];
    },

    count(): number {
      const stmt = cache.get(
        'count_nodes',
        'SELECT COUNT(*) AS cnt FROM nodes',
      );
      return (stmt.get() as { cnt: number }).cnt;
    },

    countIsolated(): number {
      const stmt = cache.get(
        'count_isolated_nodes',
        `SELECT COUNT(*) AS cnt FROM nodes n
         WHERE NOT EXISTS (
           SELECT 1 FROM edges e WHERE e.from_node = n.id OR e.to_node = n.id
         )`,
      );
      return (stmt.get() as { cnt: number }).cnt;
    },

    deleteAll(): void {
      const stmt = cache.get('delete_all_nodes', 'DELETE FROM nodes');
      stmt.run();
    },
  };
}
