import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import { AesGcmSecretSealer } from '../../../../src/engine/infra/local/secret-sealer/index.js';
import { NodeFileSystem } from '../../../../src/engine/infra/local/fs/index.js';
import { expectErr, expectOk } from '../../../helpers/result-helpers.js';
import { useTempDirs } from '../../../helpers/temp-dir.js';

const plain = new TextEncoder().encode('PAPERLESS_SECRET_KEY=test-secret\n');
const passphrase = { kind: 'value', value: 'test-secret' } as const;

describe('AesGcmSecretSealer', () => {
  const tempDir = useTempDirs();
  const sealer = new AesGcmSecretSealer(new NodeFileSystem(), { scryptLogN: 10 });

  it('unseals what it sealed', async () => {
    const sealed = expectOk(await sealer.seal(plain, passphrase), 'seal');
    expect(Buffer.from(sealed).subarray(0, 10).toString('ascii')).toBe('DSNP-SEAL1');
    expect(sealed[10]).toBe(10);
    expect(Buffer.from(expectOk(await sealer.unseal(sealed, passphrase), 'unseal'))).toEqual(Buffer.from(plain));
  });

  it('round-trips any bytes under any passphrase and rejects any other passphrase', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.uint8Array({ maxLength: 256 }),
        fc.string({ minLength: 1, maxLength: 24 }),
        fc.string({ minLength: 1, maxLength: 24 }),
        async (bytes, p, other) => {
          fc.pre(p !== other);
          const source = { kind: 'value', value: p } as const;
          const sealed = expectOk(await sealer.seal(bytes, source), 'seal');
          const opened = expectOk(await sealer.unseal(sealed, source), 'unseal');
          expect(Buffer.from(opened).equals(Buffer.from(bytes))).toBe(true);
          const wrong = await sealer.unseal(sealed, { kind: 'value', value: other });
          expect(wrong.isErr()).toBe(true);
        }
      ),
      { numRuns: 25 }
    );
  });

  it('produces different bytes for the same input', async () => {
    const a = expectOk(await sealer.seal(plain, passphrase), 'seal a');
    const b = expectOk(await sealer.seal(plain, passphrase), 'seal b');
    expect(Buffer.from(a).equals(Buffer.from(b))).toBe(false);
  });

  it('fails closed on a wrong passphrase', async () => {
    const sealed = expectOk(await sealer.seal(plain, passphrase), 'seal');
    const error = expectErr(await sealer.unseal(sealed, { kind: 'value', value: 'other-secret' }), 'unseal');
    expect(error).toEqual({
      kind: 'sealing',
      code: 'SEAL_DECRYPT_FAILED',
      message: 'Cannot unseal: wrong passphrase or modified payload',
    });
  });

  it('fails closed on a modified payload', async () => {
    const sealed = expectOk(await sealer.seal(plain, passphrase), 'seal');
    const tampered = Uint8Array.from(sealed);
    const last = tampered.length - 1;
    tampered[last] = (tampered[last] ?? 0) ^ 0xff;
    expect(expectErr(await sealer.unseal(tampered, passphrase), 'unseal').code).toBe('SEAL_DECRYPT_FAILED');
  });

  it('rejects bytes that are not a sealed payload', async () => {
    expect(expectErr(await sealer.unseal(plain, passphrase), 'unseal plain').code).toBe('SEAL_FORMAT_INVALID');
  });

  it('rejects an empty passphrase', async () => {
    const error = expectErr(await sealer.seal(plain, { kind: 'value', value: '' }), 'seal');
    expect(error.kind).toBe('local_io');
    expect(error.code).toBe('PASSPHRASE_UNAVAILABLE');
  });

  it('rejects an out-of-range cost', async () => {
    const weak = new AesGcmSecretSealer(new NodeFileSystem(), { scryptLogN: 4 });
    expect(expectErr(await weak.seal(plain, passphrase), 'seal').message).toBe('scrypt cost 2^4 is out of range');
  });

  it('reads the passphrase file without its trailing newline', async () => {
    const dir = await tempDir();
    const file = path.join(dir, 'env-passphrase');
    await fs.writeFile(file, 'test-secret\n');

    const sealed = expectOk(await sealer.seal(plain, { kind: 'file', path: file }), 'seal with file');
    expect(Buffer.from(expectOk(await sealer.unseal(sealed, passphrase), 'unseal with value'))).toEqual(
      Buffer.from(plain)
    );
  });

  it('reports a missing passphrase file', async () => {
    const dir = await tempDir();
    const error = expectErr(await sealer.seal(plain, { kind: 'file', path: path.join(dir, 'missing') }), 'seal');
    expect(error.code).toBe('PASSPHRASE_UNAVAILABLE');
  });
});
