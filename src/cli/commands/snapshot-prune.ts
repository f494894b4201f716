/**
 * Snapshot Prune Command
 *
 * Applies the retention policy. `--dry-run` reports without deleting.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { engineFailure } from '../engine-failure.js';
import type { EngineError } from '../../engine/domain/errors.js';
import type { PruneReport } from '../../engine/usecases/prune-snapshots.js';

export interface SnapshotPruneDeps {
  readonly pruneSnapshots: (dryRun: boolean) => ResultAsync<PruneReport, EngineError>;
}

export interface SnapshotPruneOptions {
  readonly dryRun?: boolean;
}

export async function executeSnapshotPruneCommand(
  deps: SnapshotPruneDeps,
  options: SnapshotPruneOptions = {}
): Promise<CliResult> {
  const dryRun = options.dryRun === true;
  const result = await deps.pruneSnapshots(dryRun);
  return result.match(
    (report) => {
      const verb = report.dryRun ? 'would delete' : 'deleted';
      const details = [
        ...report.deleted.map((id) => `${verb}: ${id}`),
        ...report.incompleteDeleted.map((name) => `${verb} incomplete: ${name}`),
        `retained: ${report.retained}`,
      ];
      return success({
        message: report.dryRun
          ? `Dry run: ${report.deleted.length} snapshot(s) would be deleted`
          : `Pruned ${report.deleted.length} snapshot(s)`,
        details,
        warnings: report.deferred.map((d) => `${d.id} expired but kept: ${d.neededBy} depends on it`),
      });
    },
    (error) => engineFailure('Prune', error)
  );
}
