/**
 * SqliteEngine — StorageEngine backed by better-sqlite3.
 *
 * A file database gets a fresh connection per operation, closed when the
 * operation returns or throws. `:memory:` keeps one connection for the
 * engine's lifetime, since an in-memory database does not outlive its
 * connection.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { SqlConnection, SqlParam, StorageEngine } from './types.js';

export const MEMORY_PATH = ':memory:';

/**
 * Options for SqliteEngine.
 */
export interface SqliteEngineOptions {
  /** Database file path, or ':memory:' */
  path: string;
  /** DDL applied once when the engine starts */
  schema: string;
}

/**
 * Adapts a better-sqlite3 handle to SqlConnection.
 */
function toConnection(db: Database.Database): SqlConnection {
  return {
    get(sql: string, params: readonly SqlParam[] = []): unknown {
      return db.prepare(sql).get(...params);
    },
    all(sql: string, params: readonly SqlParam[] = []): unknown[] {
      return db.prepare(sql).all(...params);
    },
    exec(sql: string): void {
      db.exec(sql);
    },
  };
}

export class SqliteEngine implements StorageEngine {
  readonly path: string;
  private shared: Database.Database | null = null;

  constructor(options: SqliteEngineOptions) {
    this.path = options.path === MEMORY_PATH ? MEMORY_PATH : resolve(options.path);

    try {
      if (this.path === MEMORY_PATH) {
        this.shared = new Database(MEMORY_PATH);
      } else {
        mkdirSync(dirname(this.path), { recursive: true });
      }
      this.withConnection((conn) => {
        // Persisted in the file header, so later connections inherit it.
        if (!this.shared) conn.exec('PRAGMA journal_mode = WAL');
        conn.exec(options.schema);
      });
      console.log(`Database initialized at ${this.path}`);
    } catch (err) {
      console.error(`Database initialization failed: ${err instanceof Error ? err.message : String(err)}`);
      this.close();
      throw err;
    }
  }

  withConnection<T>(fn: (conn: SqlConnection) => T): T {
    if (this.shared) {
      return fn(toConnection(this.shared));
    }

    const db = new Database(this.path);
    try {
      return fn(toConnection(db));
    } finally {
      db.close();
    }
  }

  close(): void {
    if (this.shared) {
      this.shared.close();
      this.shared = null;
    }
  }
}

/**
 * Create a SqliteEngine, switch a file database to WAL and apply the schema.
 */
export function createSqliteEngine(options: SqliteEngineOptions): SqliteEngine {
  return new SqliteEngine(options);
}
