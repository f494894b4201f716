import * as path from 'node:path';
import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA, ok, err, okAsync, errAsync } from 'neverthrow';
import type { Namespace, SnapshotId } from '../domain/ids.js';
import type { TreeDomain } from '../domain/snapshot-kind.js';
import type { EngineError } from '../domain/errors.js';
import { EngineErr } from '../domain/errors.js';
import type { SnapshotManifest } from '../domain/manifest.js';
import { resolveChain } from '../domain/chain.js';
import type { RestoreFailure } from '../domain/restore-state.js';
import type { StateDirPort } from '../ports/state-dir.port.js';
import type { RemoteSnapshotClient } from './remote-snapshot-client.js';
import type { NamespaceGate } from './namespace-gate.js';
import type { RestoreApplier, RestoreReport } from './restore-applier.js';
import type { Logger } from '../../core/logging/index.js';

export interface RestoreSnapshotPorts {
  readonly gate: NamespaceGate;
  readonly remote: RemoteSnapshotClient;
  readonly applier: RestoreApplier;
  readonly stateDir: StateDirPort;
  readonly logger: Logger;
}

export interface RestoreSnapshotSettings {
  readonly namespace: Namespace;
  readonly targetDirs: Readonly<Record<TreeDomain, string>>;
  readonly dbService: string;
  readonly maxChainHops: number;
}

export interface RestoreSnapshotArgs {
  /** Latest verified snapshot when `null`. */
  readonly id: SnapshotId | null;
  readonly restoreConfig: boolean;
}

const beforeStop = (error: EngineError): RestoreFailure => ({ phase: 'running', error });

/**
 * Restore a snapshot (or the latest verified one) under the namespace lock.
 * Every failure carries the restore phase reached.
 */
export function restoreSnapshot(
  args: RestoreSnapshotArgs,
  ports: RestoreSnapshotPorts,
  settings: RestoreSnapshotSettings
): ResultAsync<RestoreReport, RestoreFailure> {
  const ns = settings.namespace;
  const manifestDir = ports.stateDir.workDir(ns);
  const lookup = (id: SnapshotId): ResultAsync<SnapshotManifest | null, EngineError> =>
    ports.remote.readManifest(ns, id, manifestDir);

  const locked = ports.gate.withNamespaceLock<RestoreReport, RestoreFailure>(ns, () => {
    const target: ResultAsync<SnapshotId, EngineError> =
      args.id === null ? latestVerified(ns, ports.remote, lookup) : okAsync(args.id);
    return target
      .andThen((id) => resolveChain(id, lookup, { maxHops: settings.maxChainHops }))
      .mapErr(beforeStop)
      .andThen((chain) => {
        ports.logger.info({ namespace: ns, chain: chain.map((m) => m.id) }, 'restoring snapshot chain');
        return ports.applier.apply({
          namespace: ns,
          chain,
          targetDirs: settings.targetDirs,
          dbService: settings.dbService,
          restoreConfig: args.restoreConfig,
          workDir: path.join(ports.stateDir.workDir(ns), 'restore'),
        });
      });
  });

  // Lock failures happen before anything is touched.
  return locked.mapErr((e): RestoreFailure => ('phase' in e ? e : beforeStop(e)));
}

function latestVerified(
  ns: Namespace,
  remote: RemoteSnapshotClient,
  lookup: (id: SnapshotId) => ResultAsync<SnapshotManifest | null, EngineError>
): ResultAsync<SnapshotId, EngineError> {
  return remote.list(ns).andThen((ids): ResultAsync<SnapshotId, EngineError> => {
    if (ids.length === 0) {
      return errAsync(EngineErr.invalidInput('NO_SNAPSHOTS', `No snapshots in namespace ${ns}`));
    }
    const run = async (): Promise<Result<SnapshotId, EngineError>> => {
      for (const id of [...ids].reverse()) {
        const manifest = await lookup(id);
        if (manifest.isErr()) return err(manifest.error);
        if (manifest.value?.status === 'verified') return ok(id);
      }
      return err(EngineErr.invalidInput('NO_SNAPSHOTS', `No verified snapshot in namespace ${ns}`));
    };
    return new RA(run());
  });
}
