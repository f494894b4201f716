import * as path from 'node:path';
import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA, ok, err } from 'neverthrow';
import type { Namespace, SnapshotId } from '../domain/ids.js';
import type { TreeDomain } from '../domain/snapshot-kind.js';
import { TREE_DOMAINS } from '../domain/snapshot-kind.js';
import type { EngineError } from '../domain/errors.js';
import { EngineErr, describeUnknown } from '../domain/errors.js';
import type { SnapshotManifest } from '../domain/manifest.js';
import type { RestoreFailure, RestorePhase } from '../domain/restore-state.js';
import type { ArtifactArchiverPort } from '../ports/archiver.port.js';
import type { ContainerRuntimePort } from '../ports/container-runtime.port.js';
import type { DatabaseDumperPort } from '../ports/database-dumper.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import { digestDirectory } from '../archive/tree-scanner.js';
import type { RemoteSnapshotClient } from './remote-snapshot-client.js';
import type { ConfigBundler } from './config-bundler.js';
import type { Logger } from '../../core/logging/index.js';

export interface RestoreApplierPorts {
  readonly runtime: ContainerRuntimePort;
  readonly dumper: DatabaseDumperPort;
  readonly archiver: ArtifactArchiverPort;
  readonly remote: RemoteSnapshotClient;
  readonly configBundler: ConfigBundler;
  readonly fs: FileSystemPort;
  readonly logger: Logger;
}

export interface ApplyArgs {
  readonly namespace: Namespace;
  /** `[root, incr_1, ..., target]` as returned by the chain resolver. */
  readonly chain: readonly SnapshotManifest[];
  readonly targetDirs: Readonly<Record<TreeDomain, string>>;
  readonly dbService: string;
  readonly restoreConfig: boolean;
  /** Downloads land here; removed once the restore has finished. */
  readonly workDir: string;
}

export interface RestoreReport {
  readonly id: SnapshotId;
  readonly chain: readonly SnapshotId[];
  readonly domains: readonly { readonly domain: TreeDomain; readonly applied: number }[];
  readonly configRestored: readonly string[];
  readonly phase: RestorePhase;
}

interface DownloadedChain {
  /** Per domain, the archives to apply in chain order. */
  readonly archives: ReadonlyMap<TreeDomain, readonly string[]>;
  readonly database: string;
  readonly config: { readonly file: string; readonly sealed: boolean } | null;
}

class PhaseTracker {
  phase: RestorePhase = 'running';

  advance(to: RestorePhase, logger: Logger): void {
    this.phase = to;
    logger.info({ phase: to }, 'restore phase reached');
  }

  fail(error: EngineError): Result<never, RestoreFailure> {
    return err({ phase: this.phase, error });
  }
}

/**
 * `apply(chain, targetDirs)`.
 *
 * Every artifact is downloaded and checked before the application is touched.
 * Then: stop the stack, rebuild each domain from the chain, bring up only the
 * database and load the target's dump, restore the configuration when asked,
 * and start the stack. A failure reports the last phase completed; anything
 * after `running` leaves the application stopped.
 */
export class RestoreApplier {
  constructor(private readonly ports: RestoreApplierPorts) {}

  apply(args: ApplyArgs): ResultAsync<RestoreReport, RestoreFailure> {
    const run = async (): Promise<Result<RestoreReport, RestoreFailure>> => {
      const { runtime, dumper, archiver, fs } = this.ports;
      const target = args.chain[args.chain.length - 1];
      if (target === undefined) {
        return err({ phase: 'running', error: EngineErr.corruption('CHAIN_INVALID', 'Empty restore chain') });
      }
      const log = this.ports.logger.child({ namespace: args.namespace, snapshotId: target.id });
      const tracker = new PhaseTracker();

      const downloaded = await this.downloadChain(args, target);
      if (downloaded.isErr()) return tracker.fail(downloaded.error);

      const stopped = await runtime.down();
      if (stopped.isErr()) return tracker.fail(stopped.error);
      tracker.advance('stopped', log);

      const domains: { domain: TreeDomain; applied: number }[] = [];
      for (const domain of TREE_DOMAINS) {
        const archives = downloaded.value.archives.get(domain) ?? [];
        if (archives.length === 0) {
          log.warn({ domain }, 'no archive for domain in chain, directory left untouched');
          continue;
        }

        const dir = args.targetDirs[domain];
        const cleared = await fs.removeTree(dir).andThen(() => fs.mkdirp(dir));
        if (cleared.isErr()) return tracker.fail(EngineErr.localIo('LOCAL_IO_ERROR', cleared.error.message));

        for (const file of archives) {
          const extracted = await archiver.extract(file, dir);
          if (extracted.isErr()) return tracker.fail(extracted.error);
        }

        const expected = target.artifacts[domain]?.treeSha256;
        if (expected !== undefined) {
          const actual = await RA.fromPromise(digestDirectory(dir), (e) =>
            EngineErr.localIo('LOCAL_IO_ERROR', `Cannot digest ${dir}: ${describeUnknown(e)}`)
          );
          if (actual.isErr()) return tracker.fail(actual.error);
          if (actual.value !== expected) {
            return tracker.fail(
              EngineErr.corruption(
                'TREE_DIGEST_MISMATCH',
                `Restored ${domain} does not match the tree captured in ${target.id}`,
                target.id
              )
            );
          }
        }
        domains.push({ domain, applied: archives.length });
      }
      tracker.advance('domains_restored', log);

      const database = await runtime
        .up([args.dbService])
        .andThen(() => dumper.waitReady())
        .andThen(() => dumper.restore(downloaded.value.database));
      if (database.isErr()) return tracker.fail(database.error);
      tracker.advance('database_restored', log);

      let configRestored: readonly string[] = [];
      const config = downloaded.value.config;
      if (args.restoreConfig && config !== null) {
        const restored = await this.ports.configBundler.restore({
          file: config.file,
          sealed: config.sealed,
          scratchDir: path.join(args.workDir, 'config-restore'),
        });
        if (restored.isErr()) return tracker.fail(restored.error);
        configRestored = restored.value;
      } else if (args.restoreConfig) {
        log.warn('snapshot has no configuration bundle');
      }

      const started = await runtime.up();
      if (started.isErr()) return tracker.fail(started.error);
      tracker.advance('started', log);

      const cleaned = await fs.removeTree(args.workDir);
      if (cleaned.isErr()) log.warn({ err: cleaned.error }, 'could not remove restore work directory');

      return ok({
        id: target.id,
        chain: args.chain.map((m) => m.id),
        domains,
        configRestored,
        phase: tracker.phase,
      });
    };

    return new RA(run());
  }

  private downloadChain(args: ApplyArgs, target: SnapshotManifest): ResultAsync<DownloadedChain, EngineError> {
    const run = async (): Promise<Result<DownloadedChain, EngineError>> => {
      const archives = new Map<TreeDomain, string[]>();
      for (const member of args.chain) {
        const memberDir = path.join(args.workDir, member.id);
        for (const domain of TREE_DOMAINS) {
          const record = member.artifacts[domain];
          if (record === undefined) continue;
          const local = await this.ports.remote.downloadArtifact(args.namespace, member.id, record, memberDir);
          if (local.isErr()) return err(local.error);
          archives.set(domain, [...(archives.get(domain) ?? []), local.value]);
        }
      }

      const targetDir = path.join(args.workDir, target.id);
      const dbRecord = target.artifacts.database;
      if (dbRecord === undefined) {
        return err(EngineErr.corruption('SNAPSHOT_NOT_RESTORABLE', `${target.id} has no database dump`, target.id));
      }
      const database = await this.ports.remote.downloadArtifact(args.namespace, target.id, dbRecord, targetDir);
      if (database.isErr()) return err(database.error);

      let config: DownloadedChain['config'] = null;
      const configRecord = target.artifacts.config;
      if (args.restoreConfig && configRecord !== undefined) {
        const local = await this.ports.remote.downloadArtifact(args.namespace, target.id, configRecord, targetDir);
        if (local.isErr()) return err(local.error);
        config = { file: local.value, sealed: target.configSealed };
      }

      return ok({ archives, database: database.value, config });
    };
    return new RA(run());
  }
}
