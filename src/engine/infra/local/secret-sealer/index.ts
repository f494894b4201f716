import { createCipheriv, createDecipheriv, randomBytes, scrypt } from 'node:crypto';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, okAsync, errAsync } from 'neverthrow';
import type { PassphraseSource, SecretSealerPort } from '../../../ports/secret-sealer.port.js';
import type { FileSystemPort } from '../../../ports/fs.port.js';
import type { EngineError } from '../../../domain/errors.js';
import { EngineErr, describeUnknown } from '../../../domain/errors.js';
import { assertNever } from '../../../../runtime/assert-never.js';

/**
 * Sealed payload layout:
 *
 *   "DSNP-SEAL1" | logN (1 byte) | salt (16) | iv (12) | tag (16) | ciphertext
 *
 * AES-256-GCM with a key derived by scrypt (N = 2^logN, r = 8, p = 1). Salt and
 * iv are fresh per seal, so sealing the same input twice gives different bytes.
 */
const MAGIC = Buffer.from('DSNP-SEAL1', 'ascii');
const SALT_BYTES = 16;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const KEY_BYTES = 32;
const HEADER_BYTES = MAGIC.length + 1 + SALT_BYTES + IV_BYTES + TAG_BYTES;

export const MIN_SCRYPT_LOG_N = 10;
export const MAX_SCRYPT_LOG_N = 20;
export const DEFAULT_SCRYPT_LOG_N = 15;

export interface AesGcmSealerOptions {
  /** Cost used when sealing; unsealing reads it from the payload. */
  readonly scryptLogN: number;
}

function deriveKey(passphrase: string, salt: Buffer, logN: number): Promise<Buffer> {
  const N = 2 ** logN;
  return new Promise((resolve, reject) => {
    scrypt(passphrase, salt, KEY_BYTES, { N, r: 8, p: 1, maxmem: 256 * N * 8 + 1024 * 1024 }, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });
}

export class AesGcmSecretSealer implements SecretSealerPort {
  constructor(
    private readonly fs: FileSystemPort,
    private readonly options: AesGcmSealerOptions = { scryptLogN: DEFAULT_SCRYPT_LOG_N }
  ) {}

  seal(plain: Uint8Array, source: PassphraseSource): ResultAsync<Uint8Array, EngineError> {
    const logN = this.options.scryptLogN;
    if (!Number.isInteger(logN) || logN < MIN_SCRYPT_LOG_N || logN > MAX_SCRYPT_LOG_N) {
      return errAsync(EngineErr.sealing('SEAL_FAILED', `scrypt cost 2^${logN} is out of range`));
    }

    return this.readPassphrase(source).andThen((passphrase) => {
      const run = async (): Promise<Uint8Array> => {
        const salt = randomBytes(SALT_BYTES);
        const iv = randomBytes(IV_BYTES);
        const key = await deriveKey(passphrase, salt, logN);
        const cipher = createCipheriv('aes-256-gcm', key, iv);
        const ciphertext = Buffer.concat([cipher.update(plain), cipher.final()]);
        const tag = cipher.getAuthTag();
        return new Uint8Array(Buffer.concat([MAGIC, Buffer.from([logN]), salt, iv, tag, ciphertext]));
      };
      return RA.fromPromise(run(), (e) => EngineErr.sealing('SEAL_FAILED', `Sealing failed: ${describeUnknown(e)}`));
    });
  }

  unseal(sealed: Uint8Array, source: PassphraseSource): ResultAsync<Uint8Array, EngineError> {
    const bytes = Buffer.from(sealed);
    if (bytes.length < HEADER_BYTES || !bytes.subarray(0, MAGIC.length).equals(MAGIC)) {
      return errAsync(EngineErr.sealing('SEAL_FORMAT_INVALID', 'Not a sealed payload'));
    }

    let offset = MAGIC.length;
    const logN = bytes[offset] ?? 0;
    offset += 1;
    if (logN < MIN_SCRYPT_LOG_N || logN > MAX_SCRYPT_LOG_N) {
      return errAsync(EngineErr.sealing('SEAL_FORMAT_INVALID', `Unsupported scrypt cost 2^${logN}`));
    }
    const salt = bytes.subarray(offset, offset + SALT_BYTES);
    offset += SALT_BYTES;
    const iv = bytes.subarray(offset, offset + IV_BYTES);
    offset += IV_BYTES;
    const tag = bytes.subarray(offset, offset + TAG_BYTES);
    offset += TAG_BYTES;
    const ciphertext = bytes.subarray(offset);

    return this.readPassphrase(source).andThen((passphrase) => {
      const run = async (): Promise<Uint8Array> => {
        const key = await deriveKey(passphrase, salt, logN);
        const decipher = createDecipheriv('aes-256-gcm', key, iv);
        decipher.setAuthTag(tag);
        return new Uint8Array(Buffer.concat([decipher.update(ciphertext), decipher.final()]));
      };
      // GCM does not distinguish a wrong key from tampering.
      return RA.fromPromise(run(), () =>
        EngineErr.sealing('SEAL_DECRYPT_FAILED', 'Cannot unseal: wrong passphrase or modified payload')
      );
    });
  }

  private readPassphrase(source: PassphraseSource): ResultAsync<string, EngineError> {
    switch (source.kind) {
      case 'value':
        return source.value.length > 0
          ? okAsync(source.value)
          : errAsync(EngineErr.localIo('PASSPHRASE_UNAVAILABLE', 'Passphrase is empty'));
      case 'file':
        return this.fs
          .readFileUtf8(source.path)
          .mapErr((e) => EngineErr.localIo('PASSPHRASE_UNAVAILABLE', `Cannot read passphrase file: ${e.message}`))
          .andThen((raw): ResultAsync<string, EngineError> => {
            const passphrase = raw.replace(/\r?\n$/, '');
            return passphrase.length > 0
              ? okAsync(passphrase)
              : errAsync(EngineErr.localIo('PASSPHRASE_UNAVAILABLE', `Passphrase file ${source.path} is empty`));
          });
      default:
        return assertNever(source);
    }
  }
}
