import type { SnapshotId } from './ids.js';
import type { SnapshotKind, SnapshotStatus } from './snapshot-kind.js';
import { assertNever } from '../../runtime/assert-never.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export interface RetentionPolicy {
  /** Every snapshot younger than this is kept. 0 disables pruning entirely. */
  readonly recentDays: number;
  /** Archive snapshots are kept up to this age. */
  readonly archiveDays: number;
  /** Beyond `recentDays`, keep only archives taken on the 1st of a month (UTC). */
  readonly archiveMonthlyOnly: boolean;
  /** Directories without a manifest (interrupted uploads) are removed after this. */
  readonly incompleteGraceHours: number;
}

export type RetentionClass = 'recent' | 'archival' | 'expired';

export interface RetentionSubject {
  readonly kind: SnapshotKind;
  readonly createdAtMs: number;
}

/**
 * Pure classification. Boundary ages are retained (favor retention over data loss).
 */
export function classifyRetention(subject: RetentionSubject, nowMs: number, policy: RetentionPolicy): RetentionClass {
  const ageMs = nowMs - subject.createdAtMs;
  if (ageMs <= policy.recentDays * DAY_MS) return 'recent';

  switch (subject.kind) {
    case 'archive': {
      if (ageMs > policy.archiveDays * DAY_MS) return 'expired';
      if (policy.archiveMonthlyOnly && new Date(subject.createdAtMs).getUTCDate() !== 1) return 'expired';
      return 'archival';
    }
    case 'full':
    case 'incremental':
      return 'expired';
    default:
      return assertNever(subject.kind);
  }
}

export interface PruneCandidate extends RetentionSubject {
  readonly id: SnapshotId;
  readonly parentId: SnapshotId | null;
  readonly status: SnapshotStatus;
}

export interface IncompleteCandidate {
  readonly name: string;
  /** Parsed from the directory name when it is a snapshot id; null otherwise. */
  readonly createdAtMs: number | null;
}

export type RetainReason =
  | { readonly kind: 'policy'; readonly retentionClass: Exclude<RetentionClass, 'expired'> }
  | { readonly kind: 'ancestor_of_retained'; readonly descendant: SnapshotId };

export interface PrunePlan {
  readonly retained: ReadonlyMap<SnapshotId, RetainReason>;
  /** Newest first: descendants are always removed before their ancestors. */
  readonly toDelete: readonly SnapshotId[];
  /** Expired by policy but kept because a retained snapshot chains through them. */
  readonly deferred: readonly SnapshotId[];
  readonly incompleteToDelete: readonly string[];
}

/**
 * Decide what to delete.
 *
 * A snapshot that a retained snapshot reaches through `parentId` is retained too,
 * so a chain is removed whole or not at all. Parents that are not in `candidates`
 * (already gone) end the walk.
 */
export function planPrune(
  candidates: readonly PruneCandidate[],
  incomplete: readonly IncompleteCandidate[],
  nowMs: number,
  policy: RetentionPolicy
): PrunePlan {
  const byId = new Map<SnapshotId, PruneCandidate>(candidates.map((c) => [c.id, c]));
  const retained = new Map<SnapshotId, RetainReason>();

  for (const c of candidates) {
    const cls = classifyRetention(c, nowMs, policy);
    if (cls !== 'expired') retained.set(c.id, { kind: 'policy', retentionClass: cls });
  }

  const deferred = new Set<SnapshotId>();
  for (const [id, reason] of [...retained.entries()]) {
    if (reason.kind !== 'policy') continue;
    const visited = new Set<SnapshotId>([id]);
    let parentId = byId.get(id)?.parentId ?? null;
    while (parentId !== null && !visited.has(parentId)) {
      visited.add(parentId);
      const parent = byId.get(parentId);
      if (!parent) break;
      if (!retained.has(parentId)) {
        retained.set(parentId, { kind: 'ancestor_of_retained', descendant: id });
        deferred.add(parentId);
      }
      parentId = parent.parentId;
    }
  }

  const toDelete = candidates
    .map((c) => c.id)
    .filter((id) => !retained.has(id))
    .sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));

  const graceMs = policy.incompleteGraceHours * HOUR_MS;
  const incompleteToDelete = incomplete
    .filter((i) => i.createdAtMs !== null && nowMs - i.createdAtMs > graceMs)
    .map((i) => i.name)
    .sort();

  return {
    retained,
    toDelete,
    deferred: [...deferred].sort(),
    incompleteToDelete,
  };
}
