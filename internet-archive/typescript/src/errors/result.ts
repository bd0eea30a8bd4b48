/**
 * Tagged result form of client operations.
 */

import { ArchiveError } from './error.js';

/**
 * Type for operation results.
 */
export type Result<T, E = ArchiveError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<E = ArchiveError>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Awaits an operation and returns its outcome as a Result.
 *
 * Only ArchiveError rejections become `{ success: false }`; anything else is a
 * bug and is rethrown.
 */
export async function settle<T>(operation: Promise<T> | (() => Promise<T>)): Promise<Result<T>> {
  try {
    const data = await (typeof operation === 'function' ? operation() : operation);
    return ok(data);
  } catch (error) {
    if (error instanceof ArchiveError) {
      return err(error);
    }
    throw error;
  }
}

/**
 * Synchronous counterpart of {@link settle}, for constructors and validators.
 *
 * @example
 * ```typescript
 * const result = attempt(() => new Item('my-item'));
 * if (!result.success) console.error(result.error.kind);
 * ```
 */
export function attempt<T>(operation: () => T): Result<T> {
  try {
    return ok(operation());
  } catch (error) {
    if (error instanceof ArchiveError) {
      return err(error);
    }
    throw error;
  }
}
