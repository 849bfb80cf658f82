/**
 * Public exports for the user store.
 */

export type {
  UserRecord,
  UserFields,
  UserPage,
  UserStore,
  StorageEngine,
  SqlConnection,
  SqlParam,
} from './types.js';
export { UserStoreError, isUserStoreError } from './errors.js';
export type { UserStoreErrorCode } from './errors.js';
export { SqliteEngine, createSqliteEngine, MEMORY_PATH } from './SqliteEngine.js';
export type { SqliteEngineOptions } from './SqliteEngine.js';
export { SqliteUserStore, createUserStore, USERS_SCHEMA } from './SqliteUserStore.js';
