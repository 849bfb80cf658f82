/**
 * SqliteUserStore — UserStore over a StorageEngine.
 *
 * Each operation is one parameterized statement on one scoped connection;
 * listPage adds a COUNT(*) on the same connection. Writes use RETURNING so
 * the caller gets the affected row without a second round trip.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { UserStoreError, notFound } from './errors.js';
import type { StorageEngine, SqlConnection, UserFields, UserPage, UserRecord, UserStore } from './types.js';

/**
 * DDL for the users table. AUTOINCREMENT keeps deleted IDs from being reused.
 */
export const USERS_SCHEMA = `
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  email TEXT NOT NULL UNIQUE,
  created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
);
`;

const USER_COLUMNS = 'id, name, email, created_at';

const SQL = {
  insert: `INSERT INTO users (name, email) VALUES (?, ?) RETURNING ${USER_COLUMNS}`,
  selectById: `SELECT ${USER_COLUMNS} FROM users WHERE id = ?`,
  selectPage: `SELECT ${USER_COLUMNS} FROM users ORDER BY id ASC LIMIT ? OFFSET ?`,
  count: 'SELECT COUNT(*) AS total FROM users',
  update: `UPDATE users SET name = COALESCE(?, name), email = COALESCE(?, email) WHERE id = ? RETURNING ${USER_COLUMNS}`,
  delete: `DELETE FROM users WHERE id = ? RETURNING ${USER_COLUMNS}`,
} as const;

const userRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  email: z.string(),
  created_at: z.string(),
});

const countRowSchema = z.object({ total: z.number().int() });

function parseUser(row: unknown): UserRecord {
  return userRowSchema.parse(row);
}

function sqliteErrorCode(err: unknown): string | undefined {
  return err instanceof Database.SqliteError ? err.code : undefined;
}

/**
 * Map anything thrown below the store to the error taxonomy.
 */
function toStoreError(err: unknown): UserStoreError {
  if (err instanceof UserStoreError) {
    return err;
  }

  const code = sqliteErrorCode(err);
  if (code === 'SQLITE_CONSTRAINT_UNIQUE') {
    console.error(`Integrity error: ${err instanceof Error ? err.message : String(err)}`);
    return new UserStoreError('DUPLICATE_KEY', 'Email already exists', { cause: err });
  }

  const message = err instanceof z.ZodError
    ? 'unexpected row shape'
    : err instanceof Error ? err.message : String(err);
  console.error(`Database error: ${message}`);
  return new UserStoreError('STORE_UNAVAILABLE', `Database error: ${message}`, { cause: err });
}

export class SqliteUserStore implements UserStore {
  constructor(private readonly engine: StorageEngine) {}

  private run<T>(fn: (conn: SqlConnection) => T): T {
    try {
      return this.engine.withConnection(fn);
    } catch (err) {
      throw toStoreError(err);
    }
  }

  create(name: string, email: string): UserRecord {
    return this.run((conn) => parseUser(conn.get(SQL.insert, [name, email])));
  }

  getById(id: number): UserRecord {
    return this.run((conn) => {
      const row = conn.get(SQL.selectById, [id]);
      if (row === undefined) {
        throw notFound(id);
      }
      return parseUser(row);
    });
  }

  listPage(limit: number, offset: number): UserPage {
    return this.run((conn) => {
      const records = conn.all(SQL.selectPage, [limit, offset]).map(parseUser);
      const { total } = countRowSchema.parse(conn.get(SQL.count));
      return { records, total };
    });
  }

  updatePartial(id: number, fields: UserFields): UserRecord {
    return this.run((conn) => {
      const row = conn.get(SQL.update, [fields.name ?? null, fields.email ?? null, id]);
      if (row === undefined) {
        throw notFound(id);
      }
      return parseUser(row);
    });
  }

  delete(id: number): UserRecord {
    return this.run((conn) => {
      const row = conn.get(SQL.delete, [id]);
      if (row === undefined) {
        throw notFound(id);
      }
      return parseUser(row);
    });
  }

  count(): number {
    return this.run((conn) => countRowSchema.parse(conn.get(SQL.count)).total);
  }
}

/**
 * Create a user store bound to a storage engine.
 */
export function createUserStore(engine: StorageEngine): SqliteUserStore {
  return new SqliteUserStore(engine);
}
