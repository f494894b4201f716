/**
 * Restore Command
 *
 * `restore [id] [--restore-config]`; without an id the latest verified
 * snapshot is restored.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { engineFailure, restoreFailure } from '../engine-failure.js';
import type { SnapshotId } from '../../engine/domain/ids.js';
import type { RestoreFailure } from '../../engine/domain/restore-state.js';
import type { RestoreSnapshotArgs } from '../../engine/usecases/restore-snapshot.js';
import type { RestoreReport } from '../../engine/usecases/restore-applier.js';
import { parseSnapshotIdArg } from '../../engine/usecases/inspect-snapshots.js';

export interface RestoreDeps {
  readonly restoreSnapshot: (args: RestoreSnapshotArgs) => ResultAsync<RestoreReport, RestoreFailure>;
}

export interface RestoreOptions {
  readonly restoreConfig?: boolean;
}

export async function executeRestoreCommand(
  rawId: string | undefined,
  deps: RestoreDeps,
  options: RestoreOptions = {}
): Promise<CliResult> {
  let id: SnapshotId | null = null;
  if (rawId !== undefined) {
    const parsed = parseSnapshotIdArg(rawId);
    if (parsed.isErr()) return engineFailure('Restore', parsed.error);
    id = parsed.value;
  }

  const result = await deps.restoreSnapshot({ id, restoreConfig: options.restoreConfig === true });
  return result.match(
    (report) =>
      success({
        message: `Restored snapshot ${report.id}`,
        details: [
          `chain: ${report.chain.join(' -> ')}`,
          ...report.domains.map((d) => `${d.domain}: ${d.applied} archive(s) applied`),
          ...report.configRestored.map((file) => `config restored: ${file}`),
        ],
      }),
    restoreFailure
  );
}
