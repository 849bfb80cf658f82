/**
 * Error taxonomy shared by the validation layer, the store and the dispatcher.
 */

export type UserStoreErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'DUPLICATE_KEY'
  | 'STORE_UNAVAILABLE';

/**
 * A failure raised below the dispatcher. The message is safe to show to a
 * tool caller as-is.
 */
export class UserStoreError extends Error {
  constructor(
    public readonly code: UserStoreErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'UserStoreError';
  }
}

export function isUserStoreError(err: unknown): err is UserStoreError {
  return err instanceof UserStoreError;
}

export function invalidInput(message: string): UserStoreError {
  return new UserStoreError('INVALID_INPUT', message);
}

export function notFound(id: number): UserStoreError {
  return new UserStoreError('NOT_FOUND', `User with ID ${id} not found`);
}
