import * as path from 'node:path';
import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA, ok, err, okAsync, errAsync } from 'neverthrow';
import type { Namespace, SnapshotId } from '../domain/ids.js';
import { parseSnapshotId } from '../domain/ids.js';
import type { SnapshotKind, SnapshotStatus } from '../domain/snapshot-kind.js';
import type { EngineError } from '../domain/errors.js';
import { EngineErr } from '../domain/errors.js';
import type { SnapshotManifest } from '../domain/manifest.js';
import { referencedFiles } from '../domain/manifest.js';
import type { IncompleteCandidate, RetentionClass, RetentionPolicy } from '../domain/retention.js';
import { classifyRetention } from '../domain/retention.js';
import { resolveChain } from '../domain/chain.js';
import type { ArtifactArchiverPort } from '../ports/archiver.port.js';
import type { DatabaseDumperPort } from '../ports/database-dumper.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { StateDirPort } from '../ports/state-dir.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { RemoteSnapshotClient } from './remote-snapshot-client.js';
import type { NamespaceGate } from './namespace-gate.js';
import type { Logger } from '../../core/logging/index.js';

export interface InspectPorts {
  readonly remote: RemoteSnapshotClient;
  readonly stateDir: StateDirPort;
  readonly clock: TimeClockPort;
}

export interface SnapshotSummary {
  readonly id: SnapshotId;
  readonly kind: SnapshotKind;
  readonly status: SnapshotStatus;
  readonly parentId: SnapshotId | null;
  readonly sizeBytes: number;
  readonly applicationVersionTag: string;
  readonly retentionClass: RetentionClass;
}

export interface SnapshotListing {
  readonly snapshots: readonly SnapshotSummary[];
  readonly incomplete: readonly IncompleteCandidate[];
}

export function parseSnapshotIdArg(raw: string): Result<SnapshotId, EngineError> {
  const id = parseSnapshotId(raw.trim());
  return id === null
    ? err(EngineErr.invalidInput('INVALID_SNAPSHOT_ID', `Not a snapshot id: "${raw}" (expected YYYY-MM-DD_HH-MM-SS)`))
    : ok(id);
}

/** Every complete snapshot, oldest first, with its retention class under `policy`. */
export function listSnapshots(
  ns: Namespace,
  policy: RetentionPolicy,
  ports: InspectPorts
): ResultAsync<SnapshotListing, EngineError> {
  const workDir = ports.stateDir.workDir(ns);
  const nowMs = ports.clock.nowMs();

  return ports.remote.scan(ns).andThen((listing) => {
    const run = async (): Promise<Result<SnapshotListing, EngineError>> => {
      const snapshots: SnapshotSummary[] = [];
      for (const id of listing.complete) {
        const manifest = await ports.remote.readManifest(ns, id, workDir);
        if (manifest.isErr()) return err(manifest.error);
        if (manifest.value === null) continue;
        const m = manifest.value;
        snapshots.push({
          id: m.id,
          kind: m.kind,
          status: m.status,
          parentId: m.parentId,
          sizeBytes: referencedFiles(m).reduce((sum, f) => sum + f.record.sizeBytes, 0),
          applicationVersionTag: m.applicationVersionTag,
          retentionClass:
            policy.recentDays > 0
              ? classifyRetention({ kind: m.kind, createdAtMs: Date.parse(m.createdAt) }, nowMs, policy)
              : 'recent',
        });
      }
      return ok({ snapshots, incomplete: listing.incomplete });
    };
    return new RA(run());
  });
}

export function showSnapshot(ns: Namespace, id: SnapshotId, ports: InspectPorts): ResultAsync<SnapshotManifest, EngineError> {
  return ports.remote
    .readManifest(ns, id, ports.stateDir.workDir(ns))
    .andThen((manifest): ResultAsync<SnapshotManifest, EngineError> =>
      manifest === null
        ? errAsync(EngineErr.invalidInput('SNAPSHOT_NOT_FOUND', `Snapshot ${id} does not exist`, id))
        : okAsync(manifest)
    );
}

export interface VerifyPorts extends InspectPorts {
  readonly gate: NamespaceGate;
  readonly archiver: ArtifactArchiverPort;
  readonly dumper: DatabaseDumperPort;
  readonly fs: FileSystemPort;
  readonly logger: Logger;
}

export interface VerifyReport {
  readonly id: SnapshotId;
  /** Root first. */
  readonly chain: readonly SnapshotId[];
  readonly artifactsChecked: number;
}

/**
 * Resolve the chain of `id`, download every artifact the chain needs, and check
 * sizes, digests, archive structure and the dump trailer. Holds the namespace
 * lock so a concurrent prune cannot delete members mid-check.
 */
export function verifySnapshot(
  ns: Namespace,
  id: SnapshotId,
  maxHops: number,
  ports: VerifyPorts
): ResultAsync<VerifyReport, EngineError> {
  return ports.gate.withNamespaceLock(ns, () => verifyUnlocked(ns, id, maxHops, ports));
}

function verifyUnlocked(
  ns: Namespace,
  id: SnapshotId,
  maxHops: number,
  ports: VerifyPorts
): ResultAsync<VerifyReport, EngineError> {
  const workDir = ports.stateDir.workDir(ns);
  const scratch = path.join(workDir, 'verify', id);
  const lookup = (memberId: SnapshotId): ResultAsync<SnapshotManifest | null, EngineError> =>
    ports.remote.readManifest(ns, memberId, workDir);

  const check = resolveChain(id, lookup, { maxHops }).andThen((chain) => {
    const run = async (): Promise<Result<VerifyReport, EngineError>> => {
      let artifactsChecked = 0;
      for (const member of chain) {
        const memberDir = path.join(scratch, member.id);
        for (const { domain, record } of referencedFiles(member)) {
          // Only the target's database and config are ever restored.
          if ((domain === 'database' || domain === 'config') && member.id !== id) continue;

          const local = await ports.remote.downloadArtifact(ns, member.id, record, memberDir);
          if (local.isErr()) return err(local.error);

          if (domain === 'database') {
            const complete = await ports.dumper.isCompleteDump(local.value);
            if (complete.isErr()) return err(complete.error);
            if (!complete.value) {
              return err(EngineErr.corruption('ARCHIVE_INVALID', `${member.id}: database dump is truncated`, member.id));
            }
          } else if (domain !== 'config') {
            const summary = await ports.archiver.inspect(local.value);
            if (summary.isErr()) return err(summary.error);
          }
          artifactsChecked += 1;
          ports.logger.debug({ snapshotId: member.id, domain }, 'artifact verified');
        }
        const removed = await ports.fs.removeTree(memberDir);
        if (removed.isErr()) return err(EngineErr.localIo('LOCAL_IO_ERROR', removed.error.message));
      }
      return ok({ id, chain: chain.map((m) => m.id), artifactsChecked });
    };
    return new RA(run());
  });

  return check.andThen((report) =>
    ports.fs
      .removeTree(scratch)
      .mapErr((e) => EngineErr.localIo('LOCAL_IO_ERROR', e.message))
      .map(() => report)
  );
}
