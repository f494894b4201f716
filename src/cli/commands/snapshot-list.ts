/**
 * Snapshot List Command
 *
 * Lists every complete snapshot in the namespace, oldest first.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { engineFailure } from '../engine-failure.js';
import { formatBytes } from '../format-bytes.js';
import type { EngineError } from '../../engine/domain/errors.js';
import type { SnapshotListing, SnapshotSummary } from '../../engine/usecases/inspect-snapshots.js';

export interface SnapshotListDeps {
  readonly listSnapshots: () => ResultAsync<SnapshotListing, EngineError>;
}

export async function executeSnapshotListCommand(deps: SnapshotListDeps): Promise<CliResult> {
  const result = await deps.listSnapshots();
  return result.match(
    (listing) => {
      const warnings = listing.incomplete.map((c) => `Incomplete upload on remote: ${c.name}`);
      if (listing.snapshots.length === 0) {
        return success({
          message: 'No snapshots found',
          warnings,
          suggestions: ['Run "docsnap snapshot create full" to take the first one'],
        });
      }
      return success({
        message: `${listing.snapshots.length} snapshot(s)`,
        details: listing.snapshots.map(formatSummary),
        warnings,
      });
    },
    (error) => engineFailure('Listing snapshots', error)
  );
}

export function formatSummary(s: SnapshotSummary): string {
  const parent = s.parentId === null ? '' : ` <- ${s.parentId}`;
  return `${s.id}  ${s.kind.padEnd(11)} ${s.status.padEnd(8)} ${s.retentionClass.padEnd(8)} ${formatBytes(s.sizeBytes).padStart(10)}  app ${s.applicationVersionTag}${parent}`;
}
