import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import { errAsync, okAsync } from 'neverthrow';
import type { SnapshotId } from '../../../../src/engine/domain/ids.js';
import { formatSnapshotId } from '../../../../src/engine/domain/ids.js';
import type { SnapshotManifest } from '../../../../src/engine/domain/manifest.js';
import type { ManifestLookup } from '../../../../src/engine/domain/chain.js';
import { resolveChain } from '../../../../src/engine/domain/chain.js';
import { EngineErr } from '../../../../src/engine/domain/errors.js';
import { expectErr, expectOk } from '../../../helpers/result-helpers.js';
import { makeManifest, sid } from '../../../helpers/manifests.js';

function lookupFrom(manifests: readonly SnapshotManifest[]): ManifestLookup {
  const byId = new Map<SnapshotId, SnapshotManifest>(manifests.map((m) => [m.id, m]));
  return (id) => okAsync(byId.get(id) ?? null);
}

const full = makeManifest('2026-03-01_00-00-00');
const incr1 = makeManifest('2026-03-02_00-00-00', { kind: 'incremental', parentId: full.id });
const incr2 = makeManifest('2026-03-03_00-00-00', { kind: 'incremental', parentId: incr1.id });

describe('resolveChain', () => {
  it('returns the chain root first', async () => {
    const chain = expectOk(await resolveChain(incr2.id, lookupFrom([full, incr1, incr2]), { maxHops: 64 }), 'resolve');
    expect(chain.map((m) => m.id)).toEqual([full.id, incr1.id, incr2.id]);
  });

  it('resolves a full snapshot to itself', async () => {
    const chain = expectOk(await resolveChain(full.id, lookupFrom([full]), { maxHops: 64 }), 'resolve');
    expect(chain.map((m) => m.id)).toEqual([full.id]);
  });

  it('reports an unknown target as invalid input', async () => {
    const error = expectErr(await resolveChain(sid('2026-04-01_00-00-00'), lookupFrom([full]), { maxHops: 64 }), 'resolve');
    expect(error.kind).toBe('invalid_input');
    expect(error.code).toBe('SNAPSHOT_NOT_FOUND');
  });

  it('reports a missing parent as a broken chain', async () => {
    const error = expectErr(await resolveChain(incr2.id, lookupFrom([full, incr2]), { maxHops: 64 }), 'resolve');
    expect(error.code).toBe('CHAIN_BROKEN');
    expect(error.snapshotId).toBe(incr2.id);
  });

  it('refuses a failed chain member', async () => {
    const failed = { ...incr1, status: 'failed' as const };
    const error = expectErr(await resolveChain(incr2.id, lookupFrom([full, failed, incr2]), { maxHops: 64 }), 'resolve');
    expect(error.code).toBe('SNAPSHOT_NOT_RESTORABLE');
    expect(error.message).toBe(`Chain member ${incr1.id} has status failed`);
  });

  it('refuses a pending target', async () => {
    const pending = { ...incr2, status: 'pending' as const };
    const error = expectErr(await resolveChain(incr2.id, lookupFrom([full, incr1, pending]), { maxHops: 64 }), 'resolve');
    expect(error.message).toBe(`Target ${incr2.id} has status pending`);
  });

  it('stops at the hop limit', async () => {
    const error = expectErr(await resolveChain(incr2.id, lookupFrom([full, incr1, incr2]), { maxHops: 1 }), 'resolve');
    expect(error.code).toBe('CHAIN_TOO_LONG');
  });

  it('propagates lookup failures', async () => {
    const lookup: ManifestLookup = () => errAsync(EngineErr.transientIo('REMOTE_TIMEOUT', 'list timed out'));
    const error = expectErr(await resolveChain(full.id, lookup, { maxHops: 64 }), 'resolve');
    expect(error.code).toBe('REMOTE_TIMEOUT');
  });

  it('terminates on arbitrary parent graphs, cycles included', async () => {
    const base = Date.UTC(2026, 0, 1);
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.option(fc.nat(19), { nil: null }), { minLength: 1, maxLength: 20 }),
        fc.nat(19),
        async (parents, start) => {
          const ids = parents.map((_, i) => formatSnapshotId(base + i * 1000));
          const manifests = parents.map((parent, i) => {
            const id = ids[i] ?? ids[0];
            const parentId = parent === null ? null : (ids[parent % ids.length] ?? null);
            return makeManifest(id ?? '2026-01-01_00-00-00', {
              kind: parentId === null ? 'full' : 'incremental',
              parentId,
            });
          });
          const target = ids[start % ids.length] ?? ids[0];
          if (target === undefined) return;

          const result = await resolveChain(target, lookupFrom(manifests), { maxHops: 64 });
          if (result.isOk()) {
            const chain = result.value;
            expect(chain[chain.length - 1]?.id).toBe(target);
            expect(chain[0]?.kind).toBe('full');
          } else {
            expect(['CHAIN_CYCLE', 'CHAIN_TOO_LONG']).toContain(result.error.code);
          }
        }
      )
    );
  });
});
