import * as path from 'node:path';
import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA, ok, err } from 'neverthrow';
import type { FileHasherPort } from '../ports/file-hasher.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { Namespace, SnapshotId, Sha256Digest } from '../domain/ids.js';
import type { ArtifactDomain, SnapshotKind, TreeDomain } from '../domain/snapshot-kind.js';
import type { ArtifactRecord, SnapshotManifest } from '../domain/manifest.js';
import { MANIFEST_FILE, MANIFEST_FORMAT_VERSION, ManifestSchema, serializeManifest } from '../domain/manifest.js';
import type { EngineError } from '../domain/errors.js';
import { EngineErr } from '../domain/errors.js';
import type { ArchiveMode } from '../archive/archive-format.js';

export interface SnapshotMeta {
  readonly id: SnapshotId;
  readonly kind: SnapshotKind;
  readonly parentId: SnapshotId | null;
  readonly namespace: Namespace;
  readonly createdAtMs: number;
  readonly completedAtMs: number;
  readonly hostIdentity: string;
  readonly applicationVersionTag: string;
  readonly engineVersion: string;
  readonly configSealed: boolean;
  readonly skippedDomains: readonly TreeDomain[];
  /** Non-empty marks the snapshot `failed`. */
  readonly integrityProblems: readonly string[];
}

export interface StagedArtifact {
  readonly domain: ArtifactDomain;
  /** File name inside the staging directory. */
  readonly file: string;
  readonly tree?: {
    readonly treeSha256: Sha256Digest;
    readonly archiveMode: ArchiveMode;
    readonly entryCount: number;
  };
}

export type ArtifactRecords = Partial<Record<ArtifactDomain, ArtifactRecord>>;

/**
 * Hash every staged artifact into the record the manifest carries.
 */
export function describeArtifacts(
  hasher: FileHasherPort,
  stagingDir: string,
  staged: readonly StagedArtifact[]
): ResultAsync<ArtifactRecords, EngineError> {
  return RA.combine(
    staged.map((artifact) =>
      hasher.hashFile(path.join(stagingDir, artifact.file)).map(
        (digest): readonly [ArtifactDomain, ArtifactRecord] => [
          artifact.domain,
          {
            file: artifact.file,
            sizeBytes: digest.sizeBytes,
            sha256: digest.sha256,
            ...(artifact.tree ?? {}),
          },
        ]
      )
    )
  ).map((pairs) => {
    const records: ArtifactRecords = {};
    for (const [domain, record] of pairs) records[domain] = record;
    return records;
  });
}

/**
 * `build(snapshotMeta, artifacts) -> manifest`. The result is validated with the
 * same schema used on read, so an inconsistent manifest is never written.
 */
export function buildManifest(meta: SnapshotMeta, artifacts: ArtifactRecords): Result<SnapshotManifest, EngineError> {
  const verified = meta.integrityProblems.length === 0 && artifacts.database !== undefined;
  const candidate: SnapshotManifest = {
    v: MANIFEST_FORMAT_VERSION,
    id: meta.id,
    kind: meta.kind,
    parentId: meta.kind === 'incremental' ? meta.parentId : null,
    status: verified ? 'verified' : 'failed',
    namespace: meta.namespace,
    createdAt: new Date(meta.createdAtMs).toISOString(),
    completedAt: new Date(meta.completedAtMs).toISOString(),
    hostIdentity: meta.hostIdentity,
    applicationVersionTag: meta.applicationVersionTag,
    engineVersion: meta.engineVersion,
    configSealed: meta.configSealed,
    artifacts,
    skippedDomains: [...meta.skippedDomains],
    integrityProblems: [...meta.integrityProblems],
  };

  const checked = ManifestSchema.safeParse(candidate);
  if (!checked.success) {
    const first = checked.error.errors[0];
    const detail = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'unknown';
    return err(EngineErr.corruption('MANIFEST_INVALID', `Refusing to write manifest for ${meta.id} (${detail})`, meta.id));
  }
  return ok(checked.data);
}

/** The manifest is the last file written to staging. */
export function writeManifest(
  fs: FileSystemPort,
  stagingDir: string,
  manifest: SnapshotManifest
): ResultAsync<void, EngineError> {
  return fs
    .writeFileBytes(path.join(stagingDir, MANIFEST_FILE), new TextEncoder().encode(serializeManifest(manifest)))
    .mapErr((e) => EngineErr.localIo('LOCAL_IO_ERROR', `Cannot write manifest: ${e.message}`));
}
