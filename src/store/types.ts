/**
 * Types for the user store.
 *
 * The store owns the `users` table and is the only component that writes it.
 * It talks to SQLite through a StorageEngine, which hands out a scoped
 * connection per operation.
 */

/**
 * A row of the `users` table as returned to callers.
 */
export interface UserRecord {
  id: number;
  name: string;
  email: string;
  /** SQLite CURRENT_TIMESTAMP text, e.g. "2024-05-01 09:30:00" (UTC) */
  created_at: string;
}

/**
 * Fields accepted by a partial update. Omitted fields keep their value.
 */
export interface UserFields {
  name?: string;
  email?: string;
}

/**
 * One page of users plus the total row count.
 */
export interface UserPage {
  records: UserRecord[];
  total: number;
}

/**
 * Values that may be bound to a statement parameter.
 */
export type SqlParam = string | number | bigint | null;

/**
 * A connection handed out for the duration of one store operation.
 *
 * Rows come back as `unknown`; callers parse them.
 */
export interface SqlConnection {
  /** Run a statement and return its first row, if any. */
  get(sql: string, params?: readonly SqlParam[]): unknown;
  /** Run a statement and return all rows. */
  all(sql: string, params?: readonly SqlParam[]): unknown[];
  /** Execute one or more statements without parameters (DDL only). */
  exec(sql: string): void;
}

/**
 * The embedded relational store behind the user store.
 */
export interface StorageEngine {
  /**
   * Acquire a connection, run `fn`, release the connection on every exit path.
   */
  withConnection<T>(fn: (conn: SqlConnection) => T): T;
  /** Release any connection the engine keeps open. */
  close(): void;
}

/**
 * UserStore interface.
 */
export interface UserStore {
  /**
   * Insert a user. The engine assigns `id` and `created_at`.
   */
  create(name: string, email: string): UserRecord;

  /**
   * Get a user by ID.
   */
  getById(id: number): UserRecord;

  /**
   * List users ordered by ascending ID, with the total row count.
   */
  listPage(limit: number, offset: number): UserPage;

  /**
   * Update the supplied fields of a user and return the updated row.
   */
  updatePartial(id: number, fields: UserFields): UserRecord;

  /**
   * Delete a user and return the row as it was before deletion.
   */
  delete(id: number): UserRecord;

  /**
   * Total number of users.
   */
  count(): number;
}
