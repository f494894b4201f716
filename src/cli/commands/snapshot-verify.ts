/**
 * Snapshot Verify Command
 *
 * Downloads the chain of a snapshot and checks every artifact.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { engineFailure } from '../engine-failure.js';
import type { EngineError } from '../../engine/domain/errors.js';
import type { SnapshotId } from '../../engine/domain/ids.js';
import type { VerifyReport } from '../../engine/usecases/inspect-snapshots.js';
import { parseSnapshotIdArg } from '../../engine/usecases/inspect-snapshots.js';

export interface SnapshotVerifyDeps {
  readonly verifySnapshot: (id: SnapshotId) => ResultAsync<VerifyReport, EngineError>;
}

export async function executeSnapshotVerifyCommand(rawId: string, deps: SnapshotVerifyDeps): Promise<CliResult> {
  const id = parseSnapshotIdArg(rawId);
  if (id.isErr()) return engineFailure('Verify', id.error);

  const result = await deps.verifySnapshot(id.value);
  return result.match(
    (report) =>
      success({
        message: `Snapshot ${report.id} is restorable`,
        details: [`chain: ${report.chain.join(' -> ')}`, `artifacts checked: ${report.artifactsChecked}`],
      }),
    (error) => engineFailure('Verify', error)
  );
}
