import type { ResultAsync } from 'neverthrow';
import type { Sha256Digest } from '../domain/ids.js';
import type { EngineError } from '../domain/errors.js';

export interface FileDigest {
  readonly sha256: Sha256Digest;
  readonly sizeBytes: number;
}

/**
 * Port: streaming file digest. Files are never loaded whole into memory.
 */
export interface FileHasherPort {
  hashFile(filePath: string): ResultAsync<FileDigest, EngineError>;
}
