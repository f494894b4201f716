import type { ResultAsync } from 'neverthrow';
import type { Namespace } from '../domain/ids.js';
import type { EngineError } from '../domain/errors.js';

export interface SnapshotLockHandle {
  readonly kind: 'snapshot_lock_handle';
  readonly namespace: Namespace;
  readonly lockPath: string;
}

/**
 * Port: per-namespace exclusive lock.
 *
 * - one create/prune/restore per namespace at a time
 * - `acquire()` fails immediately with a `busy` error when held
 * - no stale detection; a crashed holder leaves the file for an operator to remove
 */
export interface SnapshotLockPort {
  acquire(ns: Namespace): ResultAsync<SnapshotLockHandle, EngineError>;
  release(handle: SnapshotLockHandle): ResultAsync<void, EngineError>;
}
