import { assertNever } from '../../runtime/assert-never.js';

/**
 * Closed set of snapshot kinds. Every `switch` over a kind ends in `assertNever`
 * so adding a kind is a compile error everywhere it matters.
 */
export type SnapshotKind = 'full' | 'incremental' | 'archive';

export const SNAPSHOT_KINDS: readonly SnapshotKind[] = ['full', 'incremental', 'archive'];

export type SnapshotStatus = 'pending' | 'verified' | 'failed';

/**
 * Tree domains are archived with change tracking. `config` and `database` are
 * captured whole on every snapshot.
 */
export type TreeDomain = 'media' | 'data' | 'export';
export const TREE_DOMAINS: readonly TreeDomain[] = ['media', 'data', 'export'];

export type ArtifactDomain = TreeDomain | 'config' | 'database';

/**
 * What the caller asked for. `incremental` may still produce a `full`
 * snapshot when no usable baseline exists.
 */
export type CaptureRequest =
  | { readonly kind: 'full' }
  | { readonly kind: 'incremental' }
  | { readonly kind: 'archive' };

export function parseSnapshotKind(raw: string): SnapshotKind | null {
  switch (raw) {
    case 'full':
    case 'incremental':
    case 'archive':
      return raw;
    default:
      return null;
  }
}

/**
 * A kind that terminates a chain (no parent).
 */
export function isChainRoot(kind: SnapshotKind): boolean {
  switch (kind) {
    case 'full':
    case 'archive':
      return true;
    case 'incremental':
      return false;
    default:
      return assertNever(kind);
  }
}

/**
 * Whether capturing this kind discards the change-state tokens first.
 */
export function resetsChangeTokens(kind: SnapshotKind): boolean {
  return isChainRoot(kind);
}
