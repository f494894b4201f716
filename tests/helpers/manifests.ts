import type { SnapshotId, Sha256Digest } from '../../src/engine/domain/ids.js';
import { asSha256Digest, parseSnapshotId } from '../../src/engine/domain/ids.js';
import type { SnapshotManifest } from '../../src/engine/domain/manifest.js';

/** Parse a snapshot id literal; throws on a typo in the test itself. */
export function sid(raw: string): SnapshotId {
  const id = parseSnapshotId(raw);
  if (id === null) throw new Error(`bad test snapshot id: ${raw}`);
  return id;
}

export function digestOf(char: string): Sha256Digest {
  return asSha256Digest(`sha256:${char.repeat(64)}`);
}

/**
 * A verified full snapshot with a database dump; override anything.
 */
export function makeManifest(id: string, overrides: Partial<SnapshotManifest> = {}): SnapshotManifest {
  const snapshotId = sid(id);
  return {
    v: 1,
    id: snapshotId,
    kind: 'full',
    parentId: null,
    status: 'verified',
    namespace: 'home/paperless',
    createdAt: '2026-03-10T12:00:00.000Z',
    completedAt: '2026-03-10T12:05:00.000Z',
    hostIdentity: 'test-host',
    applicationVersionTag: '2.7.1',
    engineVersion: '0.1.0',
    configSealed: false,
    artifacts: {
      database: { file: 'database', sizeBytes: 10, sha256: digestOf('a') },
    },
    skippedDomains: [],
    integrityProblems: [],
    ...overrides,
  };
}
