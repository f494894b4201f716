import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { EngineHarness } from '../helpers/engine-harness.js';
import { useTempDirs, writeTree, readTree } from '../helpers/temp-dir.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';
import { sid } from '../helpers/manifests.js';
import { ManifestSchema } from '../../src/engine/domain/manifest.js';

const HOUR_MS = 60 * 60 * 1000;

describe('incremental fallbacks and failures', () => {
  const tempDir = useTempDirs();

  async function seededHarness(): Promise<EngineHarness> {
    const h = new EngineHarness(await tempDir('fallback'), { configMode: 'none' });
    await writeTree(h.domainDir('media'), { 'a.pdf': 'alpha' });
    await writeTree(h.domainDir('data'), { 'index.db': 'idx-1' });
    return h;
  }

  it('takes a full snapshot when no change tokens exist', async () => {
    const h = await seededHarness();
    const report = expectOk(await h.create('incremental'), 'incremental without tokens');
    expect(report.requested).toBe('incremental');
    expect(report.kind).toBe('full');
    expect(report.fallback).toBe('no_tokens');
    expect(report.configCaptured).toBe(false);
  });

  it('takes a full snapshot when the domain tokens disagree on the baseline', async () => {
    const h = await seededHarness();
    const first = expectOk(await h.create('full'), 'full snapshot');
    const media = expectOk(await h.tokens.load(h.ns, 'media'), 'loading media token');
    if (media === null) throw new Error('expected a media token');
    expectOk(await h.tokens.save(h.ns, { ...media, snapshotId: sid('2026-03-01_00-00-00') }), 'saving stray token');

    h.clock.advance(HOUR_MS);
    const report = expectOk(await h.create('incremental'), 'incremental');
    expect(report.kind).toBe('full');
    expect(report.fallback).toBe('baselines_disagree');
    expect(report.parentId).toBeNull();
    expect(first.id).toBe(sid('2026-03-10_12-00-00'));
  });

  it('takes a full snapshot when the baseline is gone from the remote', async () => {
    const h = await seededHarness();
    const first = expectOk(await h.create('full'), 'full snapshot');
    await fs.rm(path.join(h.remoteRoot, h.ns, first.id), { recursive: true });

    h.clock.advance(HOUR_MS);
    const report = expectOk(await h.create('incremental'), 'incremental');
    expect(report.kind).toBe('full');
    expect(report.fallback).toBe('baseline_not_verified');
  });

  it('uploads a snapshot with a truncated dump as failed and keeps the old tokens', async () => {
    const h = await seededHarness();
    const first = expectOk(await h.create('full'), 'full snapshot');

    h.clock.advance(HOUR_MS);
    await writeTree(h.domainDir('media'), { 'b.pdf': 'bravo' });
    h.dumper.truncateNextDump = true;

    const error = expectErr(await h.create('incremental'), 'incremental with truncated dump');
    const failedId = sid('2026-03-10_13-00-00');
    expect(error.kind).toBe('corruption');
    expect(error.code).toBe('INTEGRITY_CHECK_FAILED');
    expect(error.snapshotId).toBe(failedId);
    expect(error.message).toBe(
      `Snapshot ${failedId} failed its integrity check (database: dump has no completion trailer); uploaded as failed`
    );

    const manifest = ManifestSchema.parse(JSON.parse(await fs.readFile(h.remotePath(failedId, 'manifest'), 'utf8')));
    expect(manifest.status).toBe('failed');
    expect(manifest.integrityProblems).toEqual(['database: dump has no completion trailer']);

    const media = expectOk(await h.tokens.load(h.ns, 'media'), 'loading media token');
    expect(media?.snapshotId).toBe(first.id);
  });

  it('restores the latest verified snapshot, skipping a failed one', async () => {
    const h = await seededHarness();
    const first = expectOk(await h.create('full'), 'full snapshot');
    h.clock.advance(HOUR_MS);
    h.dumper.truncateNextDump = true;
    expectErr(await h.create('full'), 'failed snapshot');

    const report = expectOk(await h.restore(null), 'restoring latest');
    expect(report.id).toBe(first.id);
    expect(report.chain).toEqual([first.id]);
  });

  it('aborts before touching anything when the database is unreachable', async () => {
    const h = await seededHarness();
    h.dumper.reachable = false;

    const error = expectErr(await h.create('full'), 'full snapshot without database');
    expect(error.kind).toBe('unreachable');
    expect(error.code).toBe('DATABASE_UNREACHABLE');
    expect(await fs.readdir(h.remoteRoot).catch(() => [])).toEqual([]);
  });

  it('refuses to run while another operation holds the namespace lock', async () => {
    const h = await seededHarness();
    const lockPath = h.stateDir.lockPath(h.ns);
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, '{}');

    const created = expectErr(await h.create('full'), 'create while locked');
    expect(created.kind).toBe('busy');
    expect(created.message).toBe(
      `Namespace home/paperless is locked by another operation (remove ${lockPath} if no operation is running)`
    );

    const restored = expectErr(await h.restore(null), 'restore while locked');
    expect(restored.phase).toBe('running');
    expect(restored.error.kind).toBe('busy');
    expect(h.runtime.calls).toEqual([]);
  });

  it('verifies only while holding the namespace lock', async () => {
    const h = await seededHarness();
    const report = expectOk(await h.create('full'), 'full snapshot');
    const lockPath = h.stateDir.lockPath(h.ns);
    await fs.mkdir(path.dirname(lockPath), { recursive: true });
    await fs.writeFile(lockPath, '{}');

    const error = expectErr(await h.verify(report.id), 'verify while locked');
    expect(error.kind).toBe('busy');

    await fs.rm(lockPath);
    const verified = expectOk(await h.verify(report.id), 'verify after the lock is gone');
    expect(verified.artifactsChecked).toBe(3);
    await expect(fs.access(lockPath)).rejects.toThrow();
  });

  it('stops after the domains when the database restore fails', async () => {
    const h = await seededHarness();
    const report = expectOk(await h.create('full'), 'full snapshot');
    await writeTree(h.domainDir('media'), { 'junk.txt': 'junk' });
    h.dumper.content = 'live';
    h.dumper.failNextRestore = true;

    const failure = expectErr(await h.restore(report.id), 'restore with a failing database');
    expect(failure.phase).toBe('domains_restored');
    expect(failure.error.code).toBe('RUNTIME_COMMAND_FAILED');
    expect(failure.error.message).toBe('psql exited 3: relation already exists');
    expect(h.runtime.calls).toEqual(['down', 'up db']);
    expect(await readTree(h.domainDir('media'))).toEqual({ 'a.pdf': 'alpha' });
    expect(h.dumper.restored).toEqual([]);
    expect(h.dumper.content).toBe('live');
  });

  it('rejects a tampered archive before stopping the stack', async () => {
    const h = await seededHarness();
    const report = expectOk(await h.create('full'), 'full snapshot');
    const mediaPath = h.remotePath(report.id, 'media');
    const original = await fs.readFile(mediaPath);
    await fs.writeFile(mediaPath, Buffer.alloc(original.length, 0x5a));
    await writeTree(h.domainDir('media'), { 'junk.txt': 'junk' });

    const failure = expectErr(await h.restore(report.id), 'restore of a tampered snapshot');
    expect(failure.phase).toBe('running');
    expect(failure.error.code).toBe('CHECKSUM_MISMATCH');
    expect(failure.error.snapshotId).toBe(report.id);
    expect(h.runtime.calls).toEqual([]);
    expect(await readTree(h.domainDir('media'))).toEqual({ 'a.pdf': 'alpha', 'junk.txt': 'junk' });
  });

  it('reports an empty namespace on restore', async () => {
    const h = await seededHarness();
    const failure = expectErr(await h.restore(null), 'restore with nothing');
    expect(failure.phase).toBe('running');
    expect(failure.error.code).toBe('NO_SNAPSHOTS');
  });
});
