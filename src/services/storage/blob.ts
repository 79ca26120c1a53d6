/**
 * Load and persist helpers shared by the record store and company registry
 */

import { logger } from '../../utils/logger.js';
import { DecodeError, PersistenceError, errorMessage } from '../../utils/errors.js';
import type { KeyValueStorage, StorageChange } from './kv-storage.js';

export interface LoadedBlob<T> {
  value: T;
  // The backend could not be read; what it holds is unknown and must not be overwritten
  readFailed: boolean;
}

/**
 * Read and decode one blob.
 *
 * A missing key yields the fallback. Undecodable content is logged and also
 * yields the fallback. A read failure yields the fallback with `readFailed` set.
 */
export function loadBlob<T>(
  storage: KeyValueStorage,
  key: string,
  decode: (raw: string, key: string) => T,
  fallback: T
): LoadedBlob<T> {
  let raw: string | null;
  try {
    raw = storage.get(key);
  } catch (error) {
    const failure = new PersistenceError(`Failed to read '${key}': ${errorMessage(error)}`, key, {
      cause: error,
    });
    logger.error(failure.message);
    return { value: fallback, readFailed: true };
  }

  if (raw === null) {
    return { value: fallback, readFailed: false };
  }

  try {
    return { value: decode(raw, key), readFailed: false };
  } catch (error) {
    const failure =
      error instanceof DecodeError ? error : new DecodeError(errorMessage(error), key);
    logger.error(`Discarding stored '${key}', starting empty`, failure);
    return { value: fallback, readFailed: false };
  }
}

/**
 * Error for a write to a key whose stored value was never read
 */
export function unreadableKeyError(key: string): PersistenceError {
  const failure = new PersistenceError(
    `Stored '${key}' could not be read; refusing to overwrite it`,
    key
  );
  logger.error(failure.message);
  return failure;
}

/**
 * Write a set of changes atomically, wrapping backend failures in PersistenceError
 */
export function persist(storage: KeyValueStorage, changes: readonly StorageChange[]): void {
  try {
    storage.writeBatch(changes);
  } catch (error) {
    const keys = changes.map((c) => c.key).join(', ');
    const failure = new PersistenceError(`Failed to write ${keys}: ${errorMessage(error)}`, keys, {
      cause: error,
    });
    logger.error(failure.message);
    throw failure;
  }
}
