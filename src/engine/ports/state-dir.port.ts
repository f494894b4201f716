import type { Namespace, SnapshotId } from '../domain/ids.js';
import type { TreeDomain } from '../domain/snapshot-kind.js';

/**
 * Port: local state directory layout (canonical paths).
 *
 *   <stateDir>/<namespace-slug>/lock
 *   <stateDir>/<namespace-slug>/tokens/<domain>.json
 *   <stateDir>/<namespace-slug>/staging/<snapshotId>/
 *   <stateDir>/<namespace-slug>/work/
 *
 * All returned paths are absolute. Callers never concatenate paths themselves.
 */
export interface StateDirPort {
  namespaceDir(ns: Namespace): string;
  lockPath(ns: Namespace): string;
  tokensDir(ns: Namespace): string;
  tokenPath(ns: Namespace, domain: TreeDomain): string;
  stagingDir(ns: Namespace, id: SnapshotId): string;
  /** Scratch space for downloads (manifest reads, verify, restore). */
  workDir(ns: Namespace): string;
}
