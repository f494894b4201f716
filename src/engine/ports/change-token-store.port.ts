import type { ResultAsync } from 'neverthrow';
import type { Namespace } from '../domain/ids.js';
import type { TreeDomain } from '../domain/snapshot-kind.js';
import type { EngineError } from '../domain/errors.js';
import type { ChangeToken } from '../archive/change-token.js';

/**
 * Port: local persistence of change-state tokens (one per tree domain).
 *
 * An unreadable or malformed token loads as `null`: the next incremental then
 * falls back to a full capture instead of failing.
 */
export interface ChangeTokenStorePort {
  load(ns: Namespace, domain: TreeDomain): ResultAsync<ChangeToken | null, EngineError>;
  /** Crash-safe replace. */
  save(ns: Namespace, token: ChangeToken): ResultAsync<void, EngineError>;
  clear(ns: Namespace): ResultAsync<void, EngineError>;
}
