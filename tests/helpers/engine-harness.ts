import * as path from 'node:path';
import type { ResultAsync } from 'neverthrow';
import type { Namespace, SnapshotId } from '../../src/engine/domain/ids.js';
import { parseNamespace } from '../../src/engine/domain/ids.js';
import type { SnapshotKind } from '../../src/engine/domain/snapshot-kind.js';
import type { EngineError } from '../../src/engine/domain/errors.js';
import type { RetentionPolicy } from '../../src/engine/domain/retention.js';
import type { RestoreFailure } from '../../src/engine/domain/restore-state.js';
import type { ObjectStorePort } from '../../src/engine/ports/object-store.port.js';
import { NodeFileSystem } from '../../src/engine/infra/local/fs/index.js';
import { LocalStateDir } from '../../src/engine/infra/local/state-dir/index.js';
import { LocalSnapshotLock } from '../../src/engine/infra/local/snapshot-lock/index.js';
import { LocalChangeTokenStore } from '../../src/engine/infra/local/token-store/index.js';
import { NodeFileHasher } from '../../src/engine/infra/local/file-hasher/index.js';
import { AesGcmSecretSealer } from '../../src/engine/infra/local/secret-sealer/index.js';
import { LocalDirectoryObjectStore } from '../../src/engine/infra/local/object-store/index.js';
import { LocalTreeArchiver } from '../../src/engine/infra/local/archiver/index.js';
import { RemoteSnapshotClient } from '../../src/engine/usecases/remote-snapshot-client.js';
import { NamespaceGate } from '../../src/engine/usecases/namespace-gate.js';
import type { ConfigBackupMode } from '../../src/engine/usecases/config-bundler.js';
import { ConfigBundler } from '../../src/engine/usecases/config-bundler.js';
import { RestoreApplier } from '../../src/engine/usecases/restore-applier.js';
import type { RestoreReport } from '../../src/engine/usecases/restore-applier.js';
import type { CreateSnapshotReport } from '../../src/engine/usecases/create-snapshot.js';
import { createSnapshot } from '../../src/engine/usecases/create-snapshot.js';
import type { PruneReport } from '../../src/engine/usecases/prune-snapshots.js';
import { pruneSnapshots } from '../../src/engine/usecases/prune-snapshots.js';
import type { SnapshotListing, VerifyReport } from '../../src/engine/usecases/inspect-snapshots.js';
import { listSnapshots, verifySnapshot } from '../../src/engine/usecases/inspect-snapshots.js';
import { restoreSnapshot } from '../../src/engine/usecases/restore-snapshot.js';
import { domainDirs } from '../../src/di/engine-operations.js';
import { noSleep } from '../../src/runtime/sleep.js';
import { FakeTimeClock } from '../fakes/time-clock.fake.js';
import { FakeContainerRuntime } from '../fakes/container-runtime.fake.js';
import { FakeDatabaseDumper } from '../fakes/database-dumper.fake.js';
import { CapturingLoggerFactory } from './test-logger.js';

export const TEST_PASSPHRASE = 'test-secret';

export const DEFAULT_TEST_RETENTION: RetentionPolicy = {
  recentDays: 30,
  archiveDays: 180,
  archiveMonthlyOnly: true,
  incompleteGraceHours: 24,
};

export interface HarnessOptions {
  readonly configMode?: ConfigBackupMode;
  readonly retention?: RetentionPolicy;
  readonly maxChainHops?: number;
}

function testNamespace(): Namespace {
  const ns = parseNamespace('home/paperless');
  if (ns === null) throw new Error('invalid test namespace');
  return ns;
}

/**
 * The engine wired against real local adapters in a temp directory, with the
 * container runtime and database replaced by in-process fakes and the remote
 * backed by a local directory.
 *
 *   <root>/data/{media,data,export}   live application trees
 *   <root>/stack/{.env,docker-compose.yml}
 *   <root>/state                      local engine state
 *   <root>/remote                     the "remote"
 */
export class EngineHarness {
  readonly ns = testNamespace();
  readonly clock = new FakeTimeClock();
  readonly runtime = new FakeContainerRuntime();
  readonly dumper = new FakeDatabaseDumper();
  readonly logs = new CapturingLoggerFactory();
  readonly fs = new NodeFileSystem();
  readonly stateDir: LocalStateDir;
  readonly store: ObjectStorePort;
  readonly remote: RemoteSnapshotClient;
  readonly tokens: LocalChangeTokenStore;
  readonly dataRoot: string;
  readonly envFile: string;
  readonly composeFile: string;
  readonly remoteRoot: string;
  retention: RetentionPolicy;

  private readonly archiver: LocalTreeArchiver;
  private readonly gate: NamespaceGate;
  private readonly configBundler: ConfigBundler;
  private readonly applier: RestoreApplier;
  private readonly maxChainHops: number;

  constructor(root: string, options: HarnessOptions = {}) {
    this.dataRoot = path.join(root, 'data');
    this.envFile = path.join(root, 'stack', '.env');
    this.composeFile = path.join(root, 'stack', 'docker-compose.yml');
    this.remoteRoot = path.join(root, 'remote');
    this.retention = options.retention ?? DEFAULT_TEST_RETENTION;
    this.maxChainHops = options.maxChainHops ?? 64;

    const logger = this.logs.root;
    this.stateDir = new LocalStateDir(path.join(root, 'state'));
    this.store = new LocalDirectoryObjectStore(this.remoteRoot);
    const hasher = new NodeFileHasher();
    this.remote = new RemoteSnapshotClient(this.store, this.fs, hasher, noSleep, this.logs.create('remote'), {
      timeoutMs: 10_000,
      retry: { attempts: 3, baseDelayMs: 1, maxDelayMs: 1 },
    });
    this.tokens = new LocalChangeTokenStore(this.stateDir, this.fs, logger);
    this.archiver = new LocalTreeArchiver(logger);
    this.gate = new NamespaceGate(new LocalSnapshotLock(this.stateDir, this.fs, this.clock), logger);
    this.configBundler = new ConfigBundler(
      this.archiver,
      new AesGcmSecretSealer(this.fs, { scryptLogN: 10 }),
      this.fs,
      logger,
      options.configMode ?? 'sealed',
      { envFile: this.envFile, composeFile: this.composeFile },
      { kind: 'value', value: TEST_PASSPHRASE }
    );
    this.applier = new RestoreApplier({
      runtime: this.runtime,
      dumper: this.dumper,
      archiver: this.archiver,
      remote: this.remote,
      configBundler: this.configBundler,
      fs: this.fs,
      logger,
    });
  }

  domainDir(domain: 'media' | 'data' | 'export'): string {
    return path.join(this.dataRoot, domain);
  }

  create(kind: SnapshotKind): ResultAsync<CreateSnapshotReport, EngineError> {
    return createSnapshot(
      { kind },
      {
        gate: this.gate,
        remote: this.remote,
        archiver: this.archiver,
        dumper: this.dumper,
        runtime: this.runtime,
        tokens: this.tokens,
        hasher: new NodeFileHasher(),
        fs: this.fs,
        stateDir: this.stateDir,
        clock: this.clock,
        configBundler: this.configBundler,
        logger: this.logs.create('create'),
      },
      {
        namespace: this.ns,
        dataRoot: this.dataRoot,
        appService: 'webserver',
        hostIdentity: 'test-host',
        engineVersion: '0.1.0',
        retention: this.retention,
      }
    );
  }

  list(): ResultAsync<SnapshotListing, EngineError> {
    return listSnapshots(this.ns, this.retention, { remote: this.remote, stateDir: this.stateDir, clock: this.clock });
  }

  verify(id: SnapshotId): ResultAsync<VerifyReport, EngineError> {
    return verifySnapshot(this.ns, id, this.maxChainHops, {
      gate: this.gate,
      remote: this.remote,
      stateDir: this.stateDir,
      clock: this.clock,
      archiver: this.archiver,
      dumper: this.dumper,
      fs: this.fs,
      logger: this.logs.create('verify'),
    });
  }

  prune(dryRun = false): ResultAsync<PruneReport, EngineError> {
    return pruneSnapshots(
      { namespace: this.ns, policy: this.retention, dryRun },
      { gate: this.gate, remote: this.remote, stateDir: this.stateDir, clock: this.clock, logger: this.logs.root }
    );
  }

  restore(id: SnapshotId | null, restoreConfig = false): ResultAsync<RestoreReport, RestoreFailure> {
    return restoreSnapshot(
      { id, restoreConfig },
      { gate: this.gate, remote: this.remote, applier: this.applier, stateDir: this.stateDir, logger: this.logs.root },
      { namespace: this.ns, targetDirs: domainDirs(this.dataRoot), dbService: 'db', maxChainHops: this.maxChainHops }
    );
  }

  /** Path of a snapshot file on the remote. */
  remotePath(id: SnapshotId, file: string): string {
    return path.join(this.remoteRoot, this.ns, id, file);
  }
}
