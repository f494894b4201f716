import * as path from 'node:path';
import type { DependencyContainer } from 'tsyringe';
import type { ResultAsync } from 'neverthrow';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import type { EngineError } from '../engine/domain/errors.js';
import type { SnapshotId } from '../engine/domain/ids.js';
import type { CaptureRequest } from '../engine/domain/snapshot-kind.js';
import type { SnapshotManifest } from '../engine/domain/manifest.js';
import type { RestoreFailure } from '../engine/domain/restore-state.js';
import type { FileSystemPort } from '../engine/ports/fs.port.js';
import type { StateDirPort } from '../engine/ports/state-dir.port.js';
import type { TimeClockPort } from '../engine/ports/time-clock.port.js';
import type { FileHasherPort } from '../engine/ports/file-hasher.port.js';
import type { ContainerRuntimePort } from '../engine/ports/container-runtime.port.js';
import type { DatabaseDumperPort } from '../engine/ports/database-dumper.port.js';
import type { ArtifactArchiverPort } from '../engine/ports/archiver.port.js';
import type { ChangeTokenStorePort } from '../engine/ports/change-token-store.port.js';
import type { RemoteSnapshotClient } from '../engine/usecases/remote-snapshot-client.js';
import type { NamespaceGate } from '../engine/usecases/namespace-gate.js';
import type { ConfigBundler } from '../engine/usecases/config-bundler.js';
import type { RestoreApplier, RestoreReport } from '../engine/usecases/restore-applier.js';
import type { CreateSnapshotReport } from '../engine/usecases/create-snapshot.js';
import { createSnapshot } from '../engine/usecases/create-snapshot.js';
import type { PruneReport } from '../engine/usecases/prune-snapshots.js';
import { pruneSnapshots } from '../engine/usecases/prune-snapshots.js';
import type { SnapshotListing, VerifyReport } from '../engine/usecases/inspect-snapshots.js';
import { listSnapshots, showSnapshot, verifySnapshot } from '../engine/usecases/inspect-snapshots.js';
import type { RestoreSnapshotArgs } from '../engine/usecases/restore-snapshot.js';
import { restoreSnapshot } from '../engine/usecases/restore-snapshot.js';
import type { TreeDomain } from '../engine/domain/snapshot-kind.js';
import { ENGINE_VERSION } from '../engine/engine-version.js';

/**
 * The operations the CLI exposes, bound to the configured namespace and the
 * container's adapters.
 */
export interface EngineOperations {
  createSnapshot(request: CaptureRequest): ResultAsync<CreateSnapshotReport, EngineError>;
  listSnapshots(): ResultAsync<SnapshotListing, EngineError>;
  showSnapshot(id: SnapshotId): ResultAsync<SnapshotManifest, EngineError>;
  verifySnapshot(id: SnapshotId): ResultAsync<VerifyReport, EngineError>;
  pruneSnapshots(dryRun: boolean): ResultAsync<PruneReport, EngineError>;
  restoreSnapshot(args: RestoreSnapshotArgs): ResultAsync<RestoreReport, RestoreFailure>;
}

export function createEngineOperations(c: DependencyContainer): EngineOperations {
  const config = c.resolve<ValidatedConfig>(DI.Config.App);
  const loggers = c.resolve<ILoggerFactory>(DI.Logging.Factory);
  const ns = config.namespace;

  const remote = c.resolve<RemoteSnapshotClient>(DI.Engine.RemoteClient);
  const stateDir = c.resolve<StateDirPort>(DI.Primitives.StateDir);
  const clock = c.resolve<TimeClockPort>(DI.Primitives.TimeClock);
  const fs = c.resolve<FileSystemPort>(DI.Primitives.FileSystem);
  const archiver = c.resolve<ArtifactArchiverPort>(DI.Adapters.Archiver);
  const dumper = c.resolve<DatabaseDumperPort>(DI.Adapters.DatabaseDumper);
  const gate = c.resolve<NamespaceGate>(DI.Engine.NamespaceGate);

  return {
    createSnapshot: (request) =>
      createSnapshot(
        request,
        {
          gate,
          remote,
          archiver,
          dumper,
          runtime: c.resolve<ContainerRuntimePort>(DI.Adapters.ContainerRuntime),
          tokens: c.resolve<ChangeTokenStorePort>(DI.Adapters.ChangeTokens),
          hasher: c.resolve<FileHasherPort>(DI.Primitives.FileHasher),
          fs,
          stateDir,
          clock,
          configBundler: c.resolve<ConfigBundler>(DI.Engine.ConfigBundler),
          logger: loggers.create('create'),
        },
        {
          namespace: ns,
          dataRoot: config.paths.dataRoot,
          appService: config.compose.appService,
          hostIdentity: config.hostIdentity,
          engineVersion: ENGINE_VERSION,
          retention: config.retention,
        }
      ),

    listSnapshots: () => listSnapshots(ns, config.retention, { remote, stateDir, clock }),

    showSnapshot: (id) => showSnapshot(ns, id, { remote, stateDir, clock }),

    verifySnapshot: (id) =>
      verifySnapshot(ns, id, config.maxChainHops, {
        gate,
        remote,
        stateDir,
        clock,
        archiver,
        dumper,
        fs,
        logger: loggers.create('verify'),
      }),

    pruneSnapshots: (dryRun) =>
      pruneSnapshots(
        { namespace: ns, policy: config.retention, dryRun },
        { gate, remote, stateDir, clock, logger: loggers.create('prune') }
      ),

    restoreSnapshot: (args) =>
      restoreSnapshot(
        args,
        {
          gate,
          remote,
          applier: c.resolve<RestoreApplier>(DI.Engine.RestoreApplier),
          stateDir,
          logger: loggers.create('restore'),
        },
        {
          namespace: ns,
          targetDirs: domainDirs(config.paths.dataRoot),
          dbService: config.compose.dbService,
          maxChainHops: config.maxChainHops,
        }
      ),
  };
}

/** Restore targets: each tree domain lives directly under the data root. */
export function domainDirs(dataRoot: string): Record<TreeDomain, string> {
  return {
    media: path.join(dataRoot, 'media'),
    data: path.join(dataRoot, 'data'),
    export: path.join(dataRoot, 'export'),
  };
}
