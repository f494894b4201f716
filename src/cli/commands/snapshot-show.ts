/**
 * Snapshot Show Command
 *
 * Prints one manifest.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { engineFailure } from '../engine-failure.js';
import { formatBytes } from '../format-bytes.js';
import type { EngineError } from '../../engine/domain/errors.js';
import type { SnapshotId } from '../../engine/domain/ids.js';
import type { SnapshotManifest } from '../../engine/domain/manifest.js';
import { referencedFiles } from '../../engine/domain/manifest.js';
import { parseSnapshotIdArg } from '../../engine/usecases/inspect-snapshots.js';

export interface SnapshotShowDeps {
  readonly showSnapshot: (id: SnapshotId) => ResultAsync<SnapshotManifest, EngineError>;
}

export async function executeSnapshotShowCommand(rawId: string, deps: SnapshotShowDeps): Promise<CliResult> {
  const id = parseSnapshotIdArg(rawId);
  if (id.isErr()) return engineFailure('Show', id.error);

  const result = await deps.showSnapshot(id.value);
  return result.match(
    (manifest) =>
      success({
        message: `Snapshot ${manifest.id}`,
        details: describeManifest(manifest),
        warnings: manifest.integrityProblems,
      }),
    (error) => engineFailure('Show', error)
  );
}

export function describeManifest(m: SnapshotManifest): string[] {
  const lines = [
    `kind: ${m.kind}`,
    `status: ${m.status}`,
    `parent: ${m.parentId ?? '-'}`,
    `created: ${m.createdAt}`,
    `completed: ${m.completedAt}`,
    `host: ${m.hostIdentity}`,
    `application: ${m.applicationVersionTag}`,
    `engine: ${m.engineVersion}`,
    `config sealed: ${m.configSealed ? 'yes' : 'no'}`,
  ];
  for (const { domain, record } of referencedFiles(m)) {
    const mode = record.archiveMode === undefined ? '' : ` ${record.archiveMode}`;
    lines.push(`${domain}: ${record.file}${mode} ${formatBytes(record.sizeBytes)} ${record.sha256}`);
  }
  if (m.skippedDomains.length > 0) lines.push(`skipped: ${m.skippedDomains.join(', ')}`);
  return lines;
}
