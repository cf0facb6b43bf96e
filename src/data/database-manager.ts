import Database from 'better-sqlite3';
import { DatabaseError, toError } from '../shared/errors.js';
import { StatementCache } from './statement-cache.js';
import { runMigrations } from './migrations/index.js';
import {
  createNodeRepository,
  type NodeRepository,
} from './repositories/node-repository.js';
import {
  createEdgeRepository,
  type EdgeRepository,
} from './repositories/edge-repository.js';
import {
  createRunRepository,
  type RunRepository,
} from './repositories/run-repository.js';

export interface DatabaseManagerOptions {
  /** ':memory:' でインメモリDB */
  dbPath: string;
  readonly?: boolean;
}

export class DatabaseManager {
  private db: Database.Database | null = null;
  private statementCache: StatementCache | null = null;
  private readonly dbPath: string;
  private readonly readonlyMode: boolean;

  // Repositories (lazy-initialized)
  private _nodeRepo: NodeRepository | null = null;
  private _edgeRepo: EdgeRepository | null = null;
  private _runRepo: RunRepository | null = null;

  constructor(options: DatabaseManagerOptions) {
    this.dbPath = options.dbPath;
    this.readonlyMode = options.readonly ?? false;
  }

  /**
   * DB接続を開き、PRAGMA設定とマイグレーションを行う
   */
  initialize(): void {
    try {
      this.db = new Database(this.dbPath, {
        readonly: this.readonlyMode,
      });

      // PRAGMA設定
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('cache_size = -64000');
      this.db.pragma('temp_store = MEMORY');
      this.db.pragma('foreign_keys = ON');

      // マイグレーション実行
      if (!this.readonlyMode) {
        runMigrations(this.db);
      }

      this.statementCache = new StatementCache(this.db);
    } catch (err) {
      throw new DatabaseError(
        `Failed to initialize database at ${this.dbPath}`,
        toError(err),
      );
    }
  }

  getDb(): Database.Database {
    if (!this.db) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.db;
  }

  getStatementCache(): StatementCache {
    if (!this.statementCache) {
      throw new DatabaseError('Database not initialized. Call initialize() first.');
    }
    return this.statementCache;
  }

  /**
   * fn をトランザクション内で実行する。例外時はロールバック
   */
  transaction<T>(fn: () => T): T {
    return this.getDb().transaction(fn)();
  }

  // --- Repository accessors ---

  get nodes(): NodeRepository {
    if (!this._nodeRepo) {
      this._nodeRepo = createNodeRepository(this.getStatementCache());
    }
    return this._nodeRepo;
  }

  get edges(): EdgeRepository {
    if (!this._edgeRepo) {
      this._edgeRepo = createEdgeRepository(this.getStatementCache());
    }
    return this._edgeRepo;
  }

  get runs(): RunRepository {
    if (!this._runRepo) {
      this._runRepo = createRunRepository(this.getStatementCache());
    }
    return this._runRepo;
  }

  /**
   * 安全なシャットダウン（WALチェックポイント + DB close）
   */
  close(): void {
    if (!this.db) return;

    try {
      // リポジトリ参照をクリア
      this._nodeRepo = null;
      this._edgeRepo = null;
      this._runRepo = null;

      if (this.statementCache) {
        this.statementCache.clear();
        this.statementCache = null;
      }

      // WALチェックポイント
      if (!this.readonlyMode) {
        this.db.pragma('wal_checkpoint(TRUNCATE)');
      }

      this.db.close();
      this.db = null;
    } catch (err) {
      throw new DatabaseError('Failed to close database', toError(err));
    }
  }
}
