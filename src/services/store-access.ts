/**
 * Runs a persistence call against the injected store, turning a missing store or a thrown
 * driver error into a BackendError result
 */

import { BackendError, err, ok, type Result } from '../errors.js';
import type { DocumentStore } from '../storage/document-store.js';

export function withStore<T>(store: DocumentStore | null, fn: (store: DocumentStore) => T): Result<T> {
  if (!store) {
    return err(new BackendError('Database not available'));
  }
  try {
    return ok(fn(store));
  } catch (error) {
    return err(BackendError.from(error));
  }
}
