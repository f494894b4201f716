/**
 * Snapshot Create Command
 *
 * `snapshot create <full|incremental|archive>`
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, misuse } from '../types/cli-result.js';
import { engineFailure } from '../engine-failure.js';
import type { EngineError } from '../../engine/domain/errors.js';
import type { CaptureRequest } from '../../engine/domain/snapshot-kind.js';
import { parseSnapshotKind } from '../../engine/domain/snapshot-kind.js';
import type { CreateSnapshotReport, DomainOutcome, AutoPruneOutcome } from '../../engine/usecases/create-snapshot.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface SnapshotCreateDeps {
  readonly createSnapshot: (request: CaptureRequest) => ResultAsync<CreateSnapshotReport, EngineError>;
}

export async function executeSnapshotCreateCommand(rawKind: string, deps: SnapshotCreateDeps): Promise<CliResult> {
  const kind = parseSnapshotKind(rawKind);
  if (kind === null) {
    return misuse(`Unknown snapshot kind "${rawKind}"`, ['Use one of: full, incremental, archive']);
  }

  const result = await deps.createSnapshot({ kind });
  return result.match(
    (report) =>
      success({
        message: `Snapshot ${report.id} created (${report.kind})`,
        details: describeReport(report),
        warnings: warningsFor(report),
      }),
    (error) => engineFailure('Snapshot creation', error)
  );
}

function describeReport(report: CreateSnapshotReport): string[] {
  const lines = [
    `status: ${report.status}`,
    `parent: ${report.parentId ?? '-'}`,
    ...report.domains.map(describeDomain),
    `config: ${report.configCaptured ? 'captured' : 'not captured'}`,
    `upload: ${report.upload === 'uploaded' ? 'uploaded' : 'already present on remote'}`,
  ];
  const prune = describePrune(report.autoPrune);
  if (prune !== null) lines.push(prune);
  return lines;
}

function describeDomain(outcome: DomainOutcome): string {
  switch (outcome.kind) {
    case 'skipped':
      return `${outcome.domain}: skipped (${outcome.sourceDir} missing)`;
    case 'archived':
      return `${outcome.domain}: ${outcome.mode}, ${outcome.entryCount} entries, ${outcome.deletedCount} deleted`;
    default:
      return assertNever(outcome);
  }
}

function describePrune(outcome: AutoPruneOutcome): string | null {
  switch (outcome.kind) {
    case 'disabled':
      return null;
    case 'pruned':
      return `pruned: ${outcome.report.deleted.length} snapshot(s), ${outcome.report.incompleteDeleted.length} incomplete`;
    case 'failed':
      return null;
    default:
      return assertNever(outcome);
  }
}

function warningsFor(report: CreateSnapshotReport): string[] {
  const warnings: string[] = [];
  if (report.fallback !== null) {
    warnings.push(`Requested ${report.requested}, took a full snapshot instead (${report.fallback.replace(/_/g, ' ')})`);
  }
  if (report.autoPrune.kind === 'failed') {
    warnings.push(`Automatic prune failed: ${report.autoPrune.error.code} ${report.autoPrune.error.message}`);
  }
  if (report.autoPrune.kind === 'pruned' && report.autoPrune.report.deferred.length > 0) {
    warnings.push(`${report.autoPrune.report.deferred.length} expired snapshot(s) kept as ancestors of retained ones`);
  }
  return warnings;
}
