import { describe, expect, it } from 'vitest';
import { parseManifest, referencedFiles, serializeManifest } from '../../../../src/engine/domain/manifest.js';
import { expectErr, expectOk } from '../../../helpers/result-helpers.js';
import { digestOf, makeManifest, sid } from '../../../helpers/manifests.js';

describe('manifest', () => {
  it('reads back what it serializes', () => {
    const manifest = makeManifest('2026-03-10_12-00-00', {
      artifacts: {
        database: { file: 'database', sizeBytes: 10, sha256: digestOf('a') },
        media: {
          file: 'media',
          sizeBytes: 2048,
          sha256: digestOf('b'),
          treeSha256: digestOf('c'),
          archiveMode: 'full',
          entryCount: 3,
        },
      },
    });
    const parsed = expectOk(parseManifest(serializeManifest(manifest), 'test'), 'parse');
    expect(parsed).toEqual(manifest);
  });

  it('rejects text that is not JSON', () => {
    const error = expectErr(parseManifest('{not json', 'ns/x/manifest'), 'parse');
    expect(error.code).toBe('MANIFEST_INVALID');
    expect(error.message).toBe('Manifest is not valid JSON: ns/x/manifest');
  });

  it('requires a parent for incrementals', () => {
    const raw = JSON.stringify(makeManifest('2026-03-10_12-00-00', { kind: 'incremental' }));
    const error = expectErr(parseManifest(raw, 'm'), 'parse');
    expect(error.message).toBe('Invalid manifest m (parentId: incremental snapshot requires parentId)');
  });

  it('requires the parent to be older', () => {
    const raw = JSON.stringify(
      makeManifest('2026-03-10_12-00-00', { kind: 'incremental', parentId: sid('2026-03-11_00-00-00') })
    );
    const error = expectErr(parseManifest(raw, 'm'), 'parse');
    expect(error.message).toBe('Invalid manifest m (parentId: parentId must be older than id)');
  });

  it('requires a database dump for verified snapshots', () => {
    const raw = JSON.stringify(makeManifest('2026-03-10_12-00-00', { artifacts: {} }));
    const error = expectErr(parseManifest(raw, 'm'), 'parse');
    expect(error.message).toBe('Invalid manifest m (artifacts.database: verified snapshot requires a database dump)');
  });

  it('lists referenced files database first', () => {
    const manifest = makeManifest('2026-03-10_12-00-00', {
      configSealed: true,
      artifacts: {
        config: { file: 'config.enc', sizeBytes: 80, sha256: digestOf('d') },
        media: { file: 'media', sizeBytes: 1, sha256: digestOf('b') },
        database: { file: 'database', sizeBytes: 10, sha256: digestOf('a') },
      },
    });
    expect(referencedFiles(manifest).map((f) => f.record.file)).toEqual(['database', 'media', 'config.enc']);
  });
});
