import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import type { PruneCandidate, RetentionPolicy } from '../../../../src/engine/domain/retention.js';
import { DAY_MS, classifyRetention, planPrune } from '../../../../src/engine/domain/retention.js';
import type { SnapshotId } from '../../../../src/engine/domain/ids.js';
import { formatSnapshotId } from '../../../../src/engine/domain/ids.js';
import type { SnapshotKind } from '../../../../src/engine/domain/snapshot-kind.js';

const NOW = Date.UTC(2026, 5, 15, 12, 0, 0);
const HOUR_MS = 60 * 60 * 1000;

const policy: RetentionPolicy = {
  recentDays: 30,
  archiveDays: 180,
  archiveMonthlyOnly: true,
  incompleteGraceHours: 24,
};

function candidate(daysAgo: number, kind: SnapshotKind, parent: PruneCandidate | null = null): PruneCandidate {
  const createdAtMs = NOW - daysAgo * DAY_MS;
  return { id: formatSnapshotId(createdAtMs), kind, createdAtMs, parentId: parent?.id ?? null, status: 'verified' };
}

describe('classifyRetention', () => {
  it('keeps anything exactly at the recent boundary', () => {
    expect(classifyRetention({ kind: 'full', createdAtMs: NOW - 30 * DAY_MS }, NOW, policy)).toBe('recent');
    expect(classifyRetention({ kind: 'full', createdAtMs: NOW - 30 * DAY_MS - 1 }, NOW, policy)).toBe('expired');
  });

  it('keeps first-of-month archives until the archive horizon', () => {
    expect(classifyRetention({ kind: 'archive', createdAtMs: Date.UTC(2026, 4, 1, 12) }, NOW, policy)).toBe('archival');
    expect(classifyRetention({ kind: 'archive', createdAtMs: Date.UTC(2026, 4, 2, 12) }, NOW, policy)).toBe('expired');
    expect(classifyRetention({ kind: 'archive', createdAtMs: NOW - 181 * DAY_MS }, NOW, policy)).toBe('expired');
  });

  it('keeps any archive in the window when monthly-only is off', () => {
    const relaxed = { ...policy, archiveMonthlyOnly: false };
    expect(classifyRetention({ kind: 'archive', createdAtMs: Date.UTC(2026, 4, 2, 12) }, NOW, relaxed)).toBe('archival');
  });

  it('never keeps old incrementals for archival', () => {
    expect(classifyRetention({ kind: 'incremental', createdAtMs: Date.UTC(2026, 4, 1, 12) }, NOW, policy)).toBe('expired');
  });
});

describe('planPrune', () => {
  it('keeps the ancestors of a retained incremental and reports them as deferred', () => {
    const full = candidate(40, 'full');
    const middle = candidate(35, 'incremental', full);
    const latest = candidate(10, 'incremental', middle);

    const plan = planPrune([full, middle, latest], [], NOW, policy);

    expect(plan.toDelete).toEqual([]);
    expect(plan.deferred).toEqual([full.id, middle.id]);
    expect(plan.retained.get(full.id)).toEqual({ kind: 'ancestor_of_retained', descendant: latest.id });
    expect(plan.retained.get(latest.id)).toEqual({ kind: 'policy', retentionClass: 'recent' });
  });

  it('deletes expired chains newest first', () => {
    const oldFull = candidate(50, 'full');
    const oldIncr = candidate(45, 'incremental', oldFull);
    const current = candidate(20, 'full');

    const plan = planPrune([oldFull, oldIncr, current], [], NOW, policy);

    expect(plan.toDelete).toEqual([oldIncr.id, oldFull.id]);
    expect(plan.deferred).toEqual([]);
    expect(plan.retained.size).toBe(1);
  });

  it('removes interrupted uploads only after the grace period', () => {
    const plan = planPrune(
      [],
      [
        { name: 'stale', createdAtMs: NOW - 25 * HOUR_MS },
        { name: 'fresh', createdAtMs: NOW - 23 * HOUR_MS },
        { name: 'not-a-snapshot', createdAtMs: null },
      ],
      NOW,
      policy
    );
    expect(plan.incompleteToDelete).toEqual(['stale']);
  });

  it('terminates on a parent cycle', () => {
    const a: PruneCandidate = { ...candidate(5, 'incremental'), parentId: formatSnapshotId(NOW - 6 * DAY_MS) };
    const b: PruneCandidate = { ...candidate(6, 'incremental'), parentId: a.id };
    const plan = planPrune([a, b], [], NOW, policy);
    expect(plan.toDelete).toEqual([]);
  });

  it('never deletes an ancestor of a retained snapshot', () => {
    const arbChain = fc.array(
      fc.record({ daysAgo: fc.integer({ min: 0, max: 400 }), linkToPrevious: fc.boolean(), archive: fc.boolean() }),
      { minLength: 1, maxLength: 25 }
    );

    fc.assert(
      fc.property(arbChain, (specs) => {
        const sorted = [...specs].sort((x, y) => y.daysAgo - x.daysAgo);
        const candidates: PruneCandidate[] = [];
        const seen = new Set<SnapshotId>();
        for (const spec of sorted) {
          const previous = candidates[candidates.length - 1] ?? null;
          const link = spec.linkToPrevious && previous !== null;
          const c = candidate(spec.daysAgo, link ? 'incremental' : spec.archive ? 'archive' : 'full', link ? previous : null);
          if (seen.has(c.id)) continue;
          seen.add(c.id);
          candidates.push(c);
        }

        const plan = planPrune(candidates, [], NOW, policy);
        const deleted = new Set(plan.toDelete);
        const byId = new Map(candidates.map((c) => [c.id, c]));

        for (const c of candidates) {
          if (deleted.has(c.id)) continue;
          let parentId = c.parentId;
          while (parentId !== null) {
            expect(deleted.has(parentId)).toBe(false);
            parentId = byId.get(parentId)?.parentId ?? null;
          }
        }
        expect(plan.toDelete).toEqual([...plan.toDelete].sort().reverse());
      })
    );
  });
});
