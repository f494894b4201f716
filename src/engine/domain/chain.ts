import { ResultAsync, err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { SnapshotId } from './ids.js';
import type { SnapshotManifest } from './manifest.js';
import type { EngineError } from './errors.js';
import { EngineErr } from './errors.js';
import { isChainRoot } from './snapshot-kind.js';

export const DEFAULT_MAX_CHAIN_HOPS = 64;

/**
 * Manifest lookup used by the resolver. `null` means "no such snapshot".
 * The resolver never infers relationships any other way than reading `parentId`.
 */
export type ManifestLookup = (id: SnapshotId) => ResultAsync<SnapshotManifest | null, EngineError>;

export interface ResolveChainOptions {
  /** Maximum parent hops from the target to its root. */
  readonly maxHops: number;
}

/**
 * Expand a target into the ordered chain `[root, incr_1, ..., target]`.
 *
 * Every member must be `verified`: a pending or failed snapshot is neither a
 * restore target nor a usable parent.
 */
export function resolveChain(
  targetId: SnapshotId,
  lookup: ManifestLookup,
  options: ResolveChainOptions
): ResultAsync<readonly SnapshotManifest[], EngineError> {
  const run = async (): Promise<Result<readonly SnapshotManifest[], EngineError>> => {
    const first = await lookup(targetId);
    if (first.isErr()) return err(first.error);
    if (first.value === null) {
      return err(EngineErr.invalidInput('SNAPSHOT_NOT_FOUND', `Snapshot ${targetId} does not exist`, targetId));
    }

    const reversed: SnapshotManifest[] = [];
    const seen = new Set<SnapshotId>();
    let current: SnapshotManifest = first.value;

    for (;;) {
      if (seen.has(current.id)) {
        return err(EngineErr.corruption('CHAIN_CYCLE', `Parent chain of ${targetId} revisits ${current.id}`, targetId));
      }
      seen.add(current.id);

      const eligible = checkEligible(current, targetId);
      if (eligible.isErr()) return err(eligible.error);
      reversed.push(current);

      if (isChainRoot(current.kind)) break;

      const parentId = current.parentId;
      if (parentId === null) {
        return err(EngineErr.corruption('CHAIN_INVALID', `Incremental snapshot ${current.id} has no parent`, targetId));
      }
      if (reversed.length > options.maxHops) {
        return err(
          EngineErr.corruption(
            'CHAIN_TOO_LONG',
            `Chain of ${targetId} exceeds ${options.maxHops} hops without reaching a full snapshot`,
            targetId
          )
        );
      }

      const parent = await lookup(parentId);
      if (parent.isErr()) return err(parent.error);
      if (parent.value === null) {
        return err(
          EngineErr.corruption('CHAIN_BROKEN', `Snapshot ${current.id} references missing parent ${parentId}`, targetId)
        );
      }
      current = parent.value;
    }

    return ok(reversed.reverse());
  };

  return new ResultAsync(run());
}

function checkEligible(manifest: SnapshotManifest, targetId: SnapshotId): Result<void, EngineError> {
  if (manifest.status === 'verified') return ok(undefined);
  const role = manifest.id === targetId ? 'Target' : 'Chain member';
  return err(
    EngineErr.corruption(
      'SNAPSHOT_NOT_RESTORABLE',
      `${role} ${manifest.id} has status ${manifest.status}`,
      targetId
    )
  );
}
