/**
 * Error classes raised by the library, plus a helper for unknown catch values.
 */

import { SessionState } from './types';

/**
 * Base class: everything the library throws on purpose extends this.
 */
export class InfiniteCraftError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A session operation was called in the wrong lifecycle state.
 */
export class SessionStateError extends InfiniteCraftError {
  constructor(message: string, readonly state: SessionState) {
    super(message);
  }
}

/**
 * Non-2xx answer or transport failure (status 0) where the caller asked for it to throw.
 */
export class ClientResponseError extends InfiniteCraftError {
  constructor(message: string, readonly status: number) {
    super(message);
  }
}

export type StorageErrorCode =
  | 'NOT_FOUND'
  | 'NOT_FILE'
  | 'NOT_WRITABLE'
  | 'NOT_DIRECTORY'
  | 'INVALID_FORMAT';

/**
 * Problem with the discoveries file or its location.
 */
export class StorageError extends InfiniteCraftError {
  constructor(message: string, readonly code: StorageErrorCode, readonly path: string) {
    super(message);
  }
}

/**
 * Node system error carrying a `code` (ENOENT, ENOTDIR...).
 * Checked structurally: errors raised by Node's own modules come from another
 * realm under Jest and fail `instanceof Error`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

/**
 * Extract a human-readable message from an unknown error value.
 * Use in catch blocks: `catch (err: unknown) { log(toErrorMessage(err)); }`
 */
export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
