import type { SnapshotId } from './ids.js';

/**
 * Engine error taxonomy.
 *
 * Drivers branch on `kind` (never on message text):
 * - `transient_io`: network/remote hiccup or timeout; retryable
 * - `corruption`: checksum mismatch, broken/cyclic chain, malformed manifest or archive; never retried
 * - `unreachable`: a dependent service (database, container runtime) did not answer in time
 * - `invalid_input`: the caller asked for something that does not exist or makes no sense
 * - `busy`: another operation holds the namespace lock
 * - `local_io`: local disk failure (staging, tokens, extraction target)
 * - `sealing`: secret sealing/unsealing failed (wrong passphrase, tampered payload)
 *
 * Retention deferrals are not errors; they are reported by the pruner.
 */
export type EngineErrorKind =
  | 'transient_io'
  | 'corruption'
  | 'unreachable'
  | 'invalid_input'
  | 'busy'
  | 'local_io'
  | 'sealing';

export type TransientIoCode = 'REMOTE_TIMEOUT' | 'REMOTE_IO_ERROR' | 'UPLOAD_MISMATCH';

export type CorruptionCode =
  | 'CHECKSUM_MISMATCH'
  | 'SIZE_MISMATCH'
  | 'MANIFEST_INVALID'
  | 'ARCHIVE_INVALID'
  | 'ARCHIVE_PATH_UNSAFE'
  | 'TREE_DIGEST_MISMATCH'
  | 'CHAIN_BROKEN'
  | 'CHAIN_CYCLE'
  | 'CHAIN_TOO_LONG'
  | 'CHAIN_INVALID'
  | 'SNAPSHOT_NOT_RESTORABLE'
  | 'INTEGRITY_CHECK_FAILED'
  | 'REMOTE_CONFLICT';

export type UnreachableCode = 'DATABASE_UNREACHABLE' | 'RUNTIME_UNAVAILABLE' | 'RUNTIME_COMMAND_FAILED';

export type InvalidInputCode = 'SNAPSHOT_NOT_FOUND' | 'NO_SNAPSHOTS' | 'INVALID_SNAPSHOT_ID' | 'INVALID_ARGUMENT';

export type LocalIoCode = 'LOCAL_IO_ERROR' | 'SOURCE_CHANGED_DURING_ARCHIVE' | 'PASSPHRASE_UNAVAILABLE';

export type SealingCode = 'SEAL_DECRYPT_FAILED' | 'SEAL_FORMAT_INVALID' | 'SEAL_FAILED';

interface ErrorBase {
  readonly message: string;
  readonly snapshotId?: SnapshotId;
}

export type EngineError =
  | (ErrorBase & { readonly kind: 'transient_io'; readonly code: TransientIoCode })
  | (ErrorBase & { readonly kind: 'corruption'; readonly code: CorruptionCode })
  | (ErrorBase & { readonly kind: 'unreachable'; readonly code: UnreachableCode; readonly service: string })
  | (ErrorBase & { readonly kind: 'invalid_input'; readonly code: InvalidInputCode })
  | (ErrorBase & { readonly kind: 'busy'; readonly code: 'NAMESPACE_LOCKED'; readonly lockPath: string })
  | (ErrorBase & { readonly kind: 'local_io'; readonly code: LocalIoCode })
  | (ErrorBase & { readonly kind: 'sealing'; readonly code: SealingCode });

export const EngineErr = {
  transientIo: (code: TransientIoCode, message: string, snapshotId?: SnapshotId): EngineError => ({
    kind: 'transient_io',
    code,
    message,
    snapshotId,
  }),

  corruption: (code: CorruptionCode, message: string, snapshotId?: SnapshotId): EngineError => ({
    kind: 'corruption',
    code,
    message,
    snapshotId,
  }),

  unreachable: (code: UnreachableCode, service: string, message: string): EngineError => ({
    kind: 'unreachable',
    code,
    service,
    message,
  }),

  invalidInput: (code: InvalidInputCode, message: string, snapshotId?: SnapshotId): EngineError => ({
    kind: 'invalid_input',
    code,
    message,
    snapshotId,
  }),

  busy: (lockPath: string, message: string): EngineError => ({
    kind: 'busy',
    code: 'NAMESPACE_LOCKED',
    lockPath,
    message,
  }),

  localIo: (code: LocalIoCode, message: string): EngineError => ({
    kind: 'local_io',
    code,
    message,
  }),

  sealing: (code: SealingCode, message: string): EngineError => ({
    kind: 'sealing',
    code,
    message,
  }),
} as const;

export function isRetryable(error: EngineError): boolean {
  return error.kind === 'transient_io';
}

/**
 * Attach the snapshot being worked on to an error that does not carry one yet.
 */
export function withSnapshotId(error: EngineError, snapshotId: SnapshotId): EngineError {
  return error.snapshotId === undefined ? { ...error, snapshotId } : error;
}

export function describeUnknown(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
