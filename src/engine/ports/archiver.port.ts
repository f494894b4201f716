import type { ResultAsync } from 'neverthrow';
import type { SnapshotId, Sha256Digest } from '../domain/ids.js';
import type { TreeDomain } from '../domain/snapshot-kind.js';
import type { EngineError } from '../domain/errors.js';
import type { ChangeToken } from '../archive/change-token.js';
import type { ArchiveHeader, ArchiveMode } from '../archive/archive-format.js';

export interface ArchiveRequest {
  readonly domain: TreeDomain;
  readonly sourceDir: string;
  /** `incremental` without a baseline is archived in full. */
  readonly mode: ArchiveMode;
  readonly baseline: ChangeToken | null;
  readonly snapshotId: SnapshotId;
  readonly outFile: string;
}

export type ArchiveOutcome =
  | { readonly kind: 'source_missing'; readonly sourceDir: string }
  | {
      readonly kind: 'archived';
      readonly mode: ArchiveMode;
      /** Not persisted by the archiver. */
      readonly token: ChangeToken;
      readonly treeSha256: Sha256Digest;
      readonly entryCount: number;
      readonly deletedCount: number;
      readonly unsupported: readonly string[];
    };

export interface ArchiveSummary {
  readonly header: ArchiveHeader;
  readonly entryCount: number;
  readonly bytes: number;
}

export interface ExtractOutcome {
  readonly written: number;
  readonly deleted: number;
}

/**
 * Port: per-domain archiving with change tracking.
 *
 * `archive(domain, mode) -> (blob, newToken)`: the blob is written to
 * `outFile`; the new token is returned for the caller to commit later.
 */
export interface ArtifactArchiverPort {
  archive(request: ArchiveRequest): ResultAsync<ArchiveOutcome, EngineError>;
  /** Decode end to end without writing anything. */
  inspect(file: string): ResultAsync<ArchiveSummary, EngineError>;
  /**
   * Apply an archive to `targetDir`. A `full` archive replaces the directory
   * contents; an `incremental` one deletes, then writes.
   */
  extract(file: string, targetDir: string): ResultAsync<ExtractOutcome, EngineError>;
}
