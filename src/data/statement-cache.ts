import type Database from 'better-sqlite3';
import type { Statement } from 'better-sqlite3';

/**
 * Prepared statement cache keyed by query name.
 * Repositories look statements up here instead of re-preparing SQL on
 * every call.
 */
export class StatementCache {
  private readonly cache = new Map<string, Statement>();

  constructor(private readonly db: Database.Database) {}

  /**
   * Prepare on first access, then serve from the cache.
   */
  get(key: string, sql: string): Statement {
    let stmt = this.cache.get(key);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      this.cache.set(key, stmt);
    }
    return stmt;
  }

  /**
   * Drop every cached statement. Called before the connection closes.
   */
  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
