import * as path from 'node:path';
import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA, ok, err, okAsync, errAsync } from 'neverthrow';
import type { Namespace, SnapshotId } from '../domain/ids.js';
import { nextSnapshotId } from '../domain/ids.js';
import type { CaptureRequest, SnapshotKind, SnapshotStatus, TreeDomain } from '../domain/snapshot-kind.js';
import { TREE_DOMAINS, resetsChangeTokens } from '../domain/snapshot-kind.js';
import type { EngineError } from '../domain/errors.js';
import { EngineErr, withSnapshotId } from '../domain/errors.js';
import type { RetentionPolicy } from '../domain/retention.js';
import type { ArtifactArchiverPort } from '../ports/archiver.port.js';
import type { DatabaseDumperPort } from '../ports/database-dumper.port.js';
import type { ContainerRuntimePort } from '../ports/container-runtime.port.js';
import type { ChangeTokenStorePort } from '../ports/change-token-store.port.js';
import type { FileHasherPort } from '../ports/file-hasher.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { StateDirPort } from '../ports/state-dir.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { ChangeToken } from '../archive/change-token.js';
import type { RemoteSnapshotClient, UploadOutcome } from './remote-snapshot-client.js';
import type { NamespaceGate } from './namespace-gate.js';
import type { ConfigBundler } from './config-bundler.js';
import type { StagedArtifact } from './manifest-builder.js';
import { buildManifest, describeArtifacts, writeManifest } from './manifest-builder.js';
import type { PruneReport } from './prune-snapshots.js';
import { pruneUnlocked } from './prune-snapshots.js';
import type { Logger } from '../../core/logging/index.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface CreateSnapshotPorts {
  readonly gate: NamespaceGate;
  readonly remote: RemoteSnapshotClient;
  readonly archiver: ArtifactArchiverPort;
  readonly dumper: DatabaseDumperPort;
  readonly runtime: ContainerRuntimePort;
  readonly tokens: ChangeTokenStorePort;
  readonly hasher: FileHasherPort;
  readonly fs: FileSystemPort;
  readonly stateDir: StateDirPort;
  readonly clock: TimeClockPort;
  readonly configBundler: ConfigBundler;
  readonly logger: Logger;
}

export interface CreateSnapshotSettings {
  readonly namespace: Namespace;
  /** Parent of the `media`, `data` and `export` trees. */
  readonly dataRoot: string;
  readonly appService: string;
  readonly hostIdentity: string;
  readonly engineVersion: string;
  readonly retention: RetentionPolicy;
}

/** Why an `incremental` request produced a `full` snapshot. */
export type FallbackReason = 'no_tokens' | 'baselines_disagree' | 'baseline_not_verified';

export type DomainOutcome =
  | { readonly domain: TreeDomain; readonly kind: 'skipped'; readonly sourceDir: string }
  | {
      readonly domain: TreeDomain;
      readonly kind: 'archived';
      readonly mode: 'full' | 'incremental';
      readonly entryCount: number;
      readonly deletedCount: number;
    };

export type AutoPruneOutcome =
  | { readonly kind: 'disabled' }
  | { readonly kind: 'pruned'; readonly report: PruneReport }
  | { readonly kind: 'failed'; readonly error: EngineError };

export interface CreateSnapshotReport {
  readonly id: SnapshotId;
  readonly requested: SnapshotKind;
  readonly kind: SnapshotKind;
  readonly parentId: SnapshotId | null;
  readonly status: SnapshotStatus;
  readonly fallback: FallbackReason | null;
  readonly domains: readonly DomainOutcome[];
  readonly configCaptured: boolean;
  readonly integrityProblems: readonly string[];
  readonly upload: UploadOutcome['kind'];
  readonly autoPrune: AutoPruneOutcome;
}

interface CapturePlan {
  readonly kind: SnapshotKind;
  readonly parentId: SnapshotId | null;
  readonly fallback: FallbackReason | null;
  readonly baselines: ReadonlyMap<TreeDomain, ChangeToken>;
}

interface CaptureResult {
  readonly staged: readonly StagedArtifact[];
  readonly domains: readonly DomainOutcome[];
  /** Tokens to commit once the snapshot is verified remotely. */
  readonly newTokens: readonly ChangeToken[];
  readonly configCaptured: boolean;
  readonly applicationVersionTag: string;
  readonly integrityProblems: readonly string[];
}

/**
 * Create one snapshot and upload it.
 *
 * Order: dump the database, archive each tree domain, bundle the configuration,
 * check integrity, write the manifest last, upload, and only then commit the
 * new change tokens. A failure before the upload leaves the remote and the
 * tokens as they were.
 *
 * A snapshot that fails its integrity check is still uploaded (status
 * `failed`, never a restore target or parent) and reported as
 * `INTEGRITY_CHECK_FAILED`.
 */
export function createSnapshot(
  request: CaptureRequest,
  ports: CreateSnapshotPorts,
  settings: CreateSnapshotSettings
): ResultAsync<CreateSnapshotReport, EngineError> {
  const ns = settings.namespace;

  return ports.gate
    .withNamespaceLock(ns, () =>
      ports.remote.list(ns).andThen((existing) => {
        const createdAtMs = ports.clock.nowMs();
        const id = nextSnapshotId(createdAtMs, existing);
        const stagingDir = ports.stateDir.stagingDir(ns, id);
        const log = ports.logger.child({ namespace: ns, snapshotId: id });

        const cleanup = (): ResultAsync<void, EngineError> =>
          ports.fs.removeTree(stagingDir).orElse((e) => {
            log.warn({ err: e }, 'could not remove staging directory');
            return okAsync(undefined);
          });

        return planCapture(request, ns, ports)
          .andThen((plan) => {
            log.info({ requested: request.kind, kind: plan.kind, parentId: plan.parentId }, 'creating snapshot');
            if (plan.fallback !== null) {
              log.warn({ reason: plan.fallback }, 'incremental not possible, taking a full snapshot');
            }
            return prepareStaging(ports.fs, stagingDir)
              .andThen(
                (): ResultAsync<void, EngineError> =>
                  resetsChangeTokens(plan.kind) ? ports.tokens.clear(ns) : okAsync(undefined)
              )
              .andThen(() => capture(plan, id, stagingDir, ports, settings, log))
              .andThen((captured) =>
                seal(plan, captured, id, createdAtMs, stagingDir, ports, settings)
                  .andThen(() => ports.remote.upload(ns, id, stagingDir))
                  .andThen((upload) => commit(plan, captured, id, ports, settings, log).map(() => upload))
                  .andThen((upload) =>
                    autoPrune(ports, settings, captured.integrityProblems.length === 0).map(
                      (autoPruneOutcome): CreateSnapshotReport => ({
                        id,
                        requested: request.kind,
                        kind: plan.kind,
                        parentId: plan.parentId,
                        status: captured.integrityProblems.length === 0 ? 'verified' : 'failed',
                        fallback: plan.fallback,
                        domains: captured.domains,
                        configCaptured: captured.configCaptured,
                        integrityProblems: captured.integrityProblems,
                        upload: upload.kind,
                        autoPrune: autoPruneOutcome,
                      })
                    )
                  )
              );
          })
          .mapErr((e) => withSnapshotId(e, id))
          .andThen((report) => cleanup().map(() => report))
          .orElse((error) => cleanup().andThen(() => errAsync(error)));
      })
    )
    .andThen((report): ResultAsync<CreateSnapshotReport, EngineError> => {
      if (report.status === 'failed') {
        return errAsync(
          EngineErr.corruption(
            'INTEGRITY_CHECK_FAILED',
            `Snapshot ${report.id} failed its integrity check (${report.integrityProblems.join('; ')}); uploaded as failed`,
            report.id
          )
        );
      }
      return okAsync(report);
    });
}

/**
 * Decide the recorded kind and the per-domain baselines. An `incremental`
 * request falls back to `full` unless the tokens agree on one baseline that is
 * present and verified on the remote.
 */
function planCapture(
  request: CaptureRequest,
  ns: Namespace,
  ports: CreateSnapshotPorts
): ResultAsync<CapturePlan, EngineError> {
  const rootPlan = (kind: SnapshotKind, fallback: FallbackReason | null): CapturePlan => ({
    kind,
    parentId: null,
    fallback,
    baselines: new Map(),
  });

  if (request.kind !== 'incremental') return okAsync(rootPlan(request.kind, null));

  return loadTokens(ports.tokens, ns).andThen((tokens): ResultAsync<CapturePlan, EngineError> => {
    if (tokens.size === 0) return okAsync(rootPlan('full', 'no_tokens'));

    const baselineIds = new Set([...tokens.values()].map((t) => t.snapshotId));
    const [baselineId] = [...baselineIds];
    if (baselineIds.size !== 1 || baselineId === undefined) {
      return okAsync(rootPlan('full', 'baselines_disagree'));
    }

    return ports.remote
      .readManifest(ns, baselineId, ports.stateDir.workDir(ns))
      .map((manifest): CapturePlan =>
        manifest === null || manifest.status !== 'verified'
          ? rootPlan('full', 'baseline_not_verified')
          : { kind: 'incremental', parentId: baselineId, fallback: null, baselines: tokens }
      );
  });
}

function loadTokens(
  store: ChangeTokenStorePort,
  ns: Namespace
): ResultAsync<ReadonlyMap<TreeDomain, ChangeToken>, EngineError> {
  const run = async (): Promise<Result<ReadonlyMap<TreeDomain, ChangeToken>, EngineError>> => {
    const tokens = new Map<TreeDomain, ChangeToken>();
    for (const domain of TREE_DOMAINS) {
      const loaded = await store.load(ns, domain);
      if (loaded.isErr()) return err(loaded.error);
      if (loaded.value !== null) tokens.set(domain, loaded.value);
    }
    return ok(tokens);
  };
  return new RA(run());
}

function prepareStaging(fs: FileSystemPort, stagingDir: string): ResultAsync<void, EngineError> {
  return fs
    .removeTree(stagingDir)
    .andThen(() => fs.mkdirp(stagingDir))
    .mapErr((e) => EngineErr.localIo('LOCAL_IO_ERROR', `Cannot prepare staging ${stagingDir}: ${e.message}`));
}

function capture(
  plan: CapturePlan,
  id: SnapshotId,
  stagingDir: string,
  ports: CreateSnapshotPorts,
  settings: CreateSnapshotSettings,
  log: Logger
): ResultAsync<CaptureResult, EngineError> {
  const ns = settings.namespace;

  const run = async (): Promise<Result<CaptureResult, EngineError>> => {
    const staged: StagedArtifact[] = [];
    const domains: DomainOutcome[] = [];
    const newTokens: ChangeToken[] = [];

    // Database first: an unreachable database aborts before anything else is read.
    const dumped = await ports.dumper.waitReady().andThen(() => ports.dumper.dump(path.join(stagingDir, 'database')));
    if (dumped.isErr()) return err(dumped.error);
    staged.push({ domain: 'database', file: 'database' });
    log.info({ sizeBytes: dumped.value.sizeBytes }, 'database dumped');

    for (const domain of TREE_DOMAINS) {
      const baseline = plan.baselines.get(domain) ?? null;
      const sourceDir = path.join(settings.dataRoot, domain);
      const archived = await ports.archiver.archive({
        domain,
        sourceDir,
        mode: plan.kind === 'incremental' ? 'incremental' : 'full',
        baseline,
        snapshotId: id,
        outFile: path.join(stagingDir, domain),
      });
      if (archived.isErr()) return err(archived.error);

      const outcome = archived.value;
      switch (outcome.kind) {
        case 'source_missing':
          log.warn({ domain, sourceDir }, 'domain directory missing, skipped');
          domains.push({ domain, kind: 'skipped', sourceDir });
          // Carry the old baseline forward so the next incremental still has one agreed baseline.
          if (baseline !== null) newTokens.push({ ...baseline, snapshotId: id });
          break;
        case 'archived':
          staged.push({
            domain,
            file: domain,
            tree: { treeSha256: outcome.treeSha256, archiveMode: outcome.mode, entryCount: outcome.entryCount },
          });
          domains.push({
            domain,
            kind: 'archived',
            mode: outcome.mode,
            entryCount: outcome.entryCount,
            deletedCount: outcome.deletedCount,
          });
          newTokens.push(outcome.token);
          break;
        default:
          return assertNever(outcome);
      }
    }

    const config = await ports.configBundler.capture({
      snapshotId: id,
      stagingDir,
      scratchDir: path.join(ports.stateDir.workDir(ns), 'config-capture'),
    });
    if (config.isErr()) return err(config.error);
    if (config.value !== null) staged.push(config.value);

    const tag = await ports.runtime.imageTag(settings.appService);
    let applicationVersionTag = 'unknown';
    if (tag.isErr()) log.warn({ err: tag.error, service: settings.appService }, 'application version unknown');
    else if (tag.value !== null) applicationVersionTag = tag.value;

    const integrity = await checkIntegrity(staged, stagingDir, ports);
    if (integrity.isErr()) return err(integrity.error);
    for (const problem of integrity.value) log.error({ problem }, 'integrity check failed');

    return ok({
      staged,
      domains,
      newTokens,
      configCaptured: config.value !== null,
      applicationVersionTag,
      integrityProblems: integrity.value,
    });
  };

  return new RA(run());
}

/**
 * Decode every archive end to end and check the dump trailer. Problems are
 * collected, not raised: they mark the snapshot `failed`.
 */
function checkIntegrity(
  staged: readonly StagedArtifact[],
  stagingDir: string,
  ports: CreateSnapshotPorts
): ResultAsync<readonly string[], EngineError> {
  const run = async (): Promise<Result<readonly string[], EngineError>> => {
    const problems: string[] = [];
    for (const artifact of staged) {
      const file = path.join(stagingDir, artifact.file);
      if (artifact.domain === 'database') {
        const complete = await ports.dumper.isCompleteDump(file);
        if (complete.isErr()) return err(complete.error);
        if (!complete.value) problems.push('database: dump has no completion trailer');
        continue;
      }
      if (artifact.tree === undefined) continue;

      const summary = await ports.archiver.inspect(file);
      if (summary.isErr()) {
        if (summary.error.kind !== 'corruption') return err(summary.error);
        problems.push(`${artifact.domain}: ${summary.error.message}`);
      } else if (summary.value.entryCount !== artifact.tree.entryCount) {
        problems.push(
          `${artifact.domain}: archive holds ${summary.value.entryCount} entries, expected ${artifact.tree.entryCount}`
        );
      }
    }
    return ok(problems);
  };
  return new RA(run());
}

function seal(
  plan: CapturePlan,
  captured: CaptureResult,
  id: SnapshotId,
  createdAtMs: number,
  stagingDir: string,
  ports: CreateSnapshotPorts,
  settings: CreateSnapshotSettings
): ResultAsync<void, EngineError> {
  return describeArtifacts(ports.hasher, stagingDir, captured.staged)
    .andThen((artifacts) =>
      buildManifest(
        {
          id,
          kind: plan.kind,
          parentId: plan.parentId,
          namespace: settings.namespace,
          createdAtMs,
          completedAtMs: ports.clock.nowMs(),
          hostIdentity: settings.hostIdentity,
          applicationVersionTag: captured.applicationVersionTag,
          engineVersion: settings.engineVersion,
          configSealed: ports.configBundler.sealed && captured.configCaptured,
          skippedDomains: captured.domains.filter((d) => d.kind === 'skipped').map((d) => d.domain),
          integrityProblems: captured.integrityProblems,
        },
        artifacts
      )
    )
    .andThen((manifest) => writeManifest(ports.fs, stagingDir, manifest));
}

/** Tokens advance only for a snapshot that is verified and on the remote. */
function commit(
  plan: CapturePlan,
  captured: CaptureResult,
  id: SnapshotId,
  ports: CreateSnapshotPorts,
  settings: CreateSnapshotSettings,
  log: Logger
): ResultAsync<void, EngineError> {
  if (captured.integrityProblems.length > 0) return okAsync(undefined);
  const ns = settings.namespace;
  return captured.newTokens
    .reduce<ResultAsync<void, EngineError>>(
      (acc, token) => acc.andThen(() => ports.tokens.save(ns, token)),
      okAsync(undefined)
    )
    .map(() => {
      log.info({ kind: plan.kind, tokens: captured.newTokens.length, snapshotId: id }, 'snapshot committed');
    });
}

function autoPrune(
  ports: CreateSnapshotPorts,
  settings: CreateSnapshotSettings,
  verified: boolean
): ResultAsync<AutoPruneOutcome, EngineError> {
  if (!verified || settings.retention.recentDays <= 0) return okAsync({ kind: 'disabled' });
  return pruneUnlocked({ namespace: settings.namespace, policy: settings.retention, dryRun: false }, ports)
    .map((report): AutoPruneOutcome => ({ kind: 'pruned', report }))
    .orElse((error) => {
      // The snapshot itself is committed; a prune failure is reported, not fatal.
      ports.logger.warn({ err: error }, 'automatic prune failed');
      return okAsync<AutoPruneOutcome, EngineError>({ kind: 'failed', error });
    });
}
