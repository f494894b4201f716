import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { EngineHarness } from '../helpers/engine-harness.js';
import { useTempDirs, writeTree } from '../helpers/temp-dir.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';
import { sid } from '../helpers/manifests.js';
import { FAKE_CLOCK_START_MS } from '../fakes/time-clock.fake.js';
import { DAY_MS } from '../../src/engine/domain/retention.js';

describe('retention', () => {
  const tempDir = useTempDirs();

  async function seededHarness(): Promise<EngineHarness> {
    const h = new EngineHarness(await tempDir('retention'), { configMode: 'none' });
    await writeTree(h.domainDir('media'), { 'a.pdf': 'alpha' });
    await writeTree(h.domainDir('data'), { 'index.db': 'idx-1' });
    return h;
  }

  const at = (days: number): number => FAKE_CLOCK_START_MS + days * DAY_MS;

  async function remoteIds(h: EngineHarness): Promise<string[]> {
    return (await fs.readdir(path.join(h.remoteRoot, h.ns))).sort();
  }

  it('deletes a whole expired chain once a newer full snapshot is retained', async () => {
    const h = await seededHarness();
    expectOk(await h.create('full'), 'full at day 0');
    h.clock.setTime(at(1));
    expectOk(await h.create('incremental'), 'incremental at day 1');
    h.clock.setTime(at(10));
    expectOk(await h.create('full'), 'full at day 10');

    h.clock.setTime(at(40));
    const report = expectOk(await h.prune(), 'prune at day 40');
    expect(report.dryRun).toBe(false);
    expect(report.deleted).toEqual([sid('2026-03-11_12-00-00'), sid('2026-03-10_12-00-00')]);
    expect(report.deferred).toEqual([]);
    expect(report.retained).toBe(1);
    expect(await remoteIds(h)).toEqual(['2026-03-20_12-00-00']);
  });

  it('keeps expired ancestors of a retained incremental', async () => {
    const h = await seededHarness();
    expectOk(await h.create('full'), 'full at day 0');
    h.clock.setTime(at(5));
    expectOk(await h.create('incremental'), 'incremental at day 5');
    h.clock.setTime(at(35));
    const latest = expectOk(await h.create('incremental'), 'incremental at day 35');
    expect(latest.autoPrune).toEqual({
      kind: 'pruned',
      report: {
        dryRun: false,
        deleted: [],
        deferred: [{ id: sid('2026-03-10_12-00-00'), neededBy: sid('2026-03-15_12-00-00') }],
        incompleteDeleted: [],
        retained: 3,
      },
    });

    h.clock.setTime(at(40));
    const report = expectOk(await h.prune(), 'prune at day 40');
    expect(report.deleted).toEqual([]);
    expect(report.deferred).toEqual([
      { id: sid('2026-03-10_12-00-00'), neededBy: latest.id },
      { id: sid('2026-03-15_12-00-00'), neededBy: latest.id },
    ]);
    expect(await remoteIds(h)).toEqual(['2026-03-10_12-00-00', '2026-03-15_12-00-00', '2026-04-14_12-00-00']);
  });

  it('reports without deleting on a dry run', async () => {
    const h = await seededHarness();
    expectOk(await h.create('full'), 'full at day 0');

    h.clock.setTime(at(31));
    const report = expectOk(await h.prune(true), 'dry run');
    expect(report.dryRun).toBe(true);
    expect(report.deleted).toEqual([sid('2026-03-10_12-00-00')]);
    expect(report.retained).toBe(0);
    expect(await remoteIds(h)).toEqual(['2026-03-10_12-00-00']);
  });

  it('refuses to prune when retention is disabled', async () => {
    const h = await seededHarness();
    h.retention = { ...h.retention, recentDays: 0 };
    const error = expectErr(await h.prune(), 'prune with retention disabled');
    expect(error.code).toBe('INVALID_ARGUMENT');
  });
});
