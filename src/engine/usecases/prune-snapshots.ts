import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA, ok, err, okAsync, errAsync } from 'neverthrow';
import type { Namespace, SnapshotId } from '../domain/ids.js';
import type { EngineError } from '../domain/errors.js';
import { EngineErr } from '../domain/errors.js';
import type { PruneCandidate, PrunePlan, RetainReason, RetentionPolicy } from '../domain/retention.js';
import { planPrune } from '../domain/retention.js';
import type { StateDirPort } from '../ports/state-dir.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { RemoteSnapshotClient } from './remote-snapshot-client.js';
import type { NamespaceGate } from './namespace-gate.js';
import type { Logger } from '../../core/logging/index.js';

export interface PruneSnapshotsPorts {
  readonly gate: NamespaceGate;
  readonly remote: RemoteSnapshotClient;
  readonly stateDir: StateDirPort;
  readonly clock: TimeClockPort;
  readonly logger: Logger;
}

export interface PruneSnapshotsArgs {
  readonly namespace: Namespace;
  readonly policy: RetentionPolicy;
  /** Report what would be deleted without deleting. */
  readonly dryRun: boolean;
}

export interface PruneReport {
  readonly dryRun: boolean;
  /** Deleted (or, on a dry run, to be deleted), newest first. */
  readonly deleted: readonly SnapshotId[];
  /** Expired by policy but kept because a retained snapshot depends on them. */
  readonly deferred: readonly { readonly id: SnapshotId; readonly neededBy: SnapshotId }[];
  readonly incompleteDeleted: readonly string[];
  readonly retained: number;
}

/**
 * `prune(ns, policy) -> deletedId[]` under the namespace lock.
 */
export function pruneSnapshots(args: PruneSnapshotsArgs, ports: PruneSnapshotsPorts): ResultAsync<PruneReport, EngineError> {
  if (args.policy.recentDays <= 0) {
    return errAsync(
      EngineErr.invalidInput('INVALID_ARGUMENT', 'Retention is disabled (RETENTION_DAYS=0); nothing is pruned')
    );
  }
  return ports.gate.withNamespaceLock(args.namespace, () => pruneUnlocked(args, ports));
}

/**
 * Prune body for callers that already hold the namespace lock.
 */
export function pruneUnlocked(
  args: PruneSnapshotsArgs,
  ports: Omit<PruneSnapshotsPorts, 'gate'>
): ResultAsync<PruneReport, EngineError> {
  const { namespace: ns, policy, dryRun } = args;
  const workDir = ports.stateDir.workDir(ns);

  return ports.remote.scan(ns).andThen((listing) => {
    const loadCandidates = async (): Promise<Result<PruneCandidate[], EngineError>> => {
      const candidates: PruneCandidate[] = [];
      for (const id of listing.complete) {
        const manifest = await ports.remote.readManifest(ns, id, workDir);
        if (manifest.isErr()) return err(manifest.error);
        if (manifest.value === null) continue;
        const m = manifest.value;
        candidates.push({
          id: m.id,
          parentId: m.parentId,
          status: m.status,
          kind: m.kind,
          createdAtMs: Date.parse(m.createdAt),
        });
      }
      return ok(candidates);
    };

    return new RA(loadCandidates()).andThen((candidates): ResultAsync<PruneReport, EngineError> => {
      const plan = planPrune(candidates, listing.incomplete, ports.clock.nowMs(), policy);
      const report = toReport(plan, dryRun);

      for (const d of report.deferred) {
        ports.logger.info({ namespace: ns, snapshotId: d.id, neededBy: d.neededBy }, 'expired snapshot kept for chain');
      }
      if (dryRun) return okAsync(report);

      const deleteAll = async (): Promise<Result<PruneReport, EngineError>> => {
        for (const id of plan.toDelete) {
          const deleted = await ports.remote.delete(ns, id);
          if (deleted.isErr()) return err(deleted.error);
        }
        for (const name of plan.incompleteToDelete) {
          const deleted = await ports.remote.deleteIncomplete(ns, name);
          if (deleted.isErr()) return err(deleted.error);
        }
        ports.logger.info(
          { namespace: ns, deleted: plan.toDelete.length, incomplete: plan.incompleteToDelete.length },
          'prune complete'
        );
        return ok(report);
      };
      return new RA(deleteAll());
    });
  });
}

function toReport(plan: PrunePlan, dryRun: boolean): PruneReport {
  const deferred = plan.deferred.map((id) => {
    const reason: RetainReason | undefined = plan.retained.get(id);
    return { id, neededBy: reason?.kind === 'ancestor_of_retained' ? reason.descendant : id };
  });
  return {
    dryRun,
    deleted: plan.toDelete,
    deferred,
    incompleteDeleted: plan.incompleteToDelete,
    retained: plan.retained.size,
  };
}
