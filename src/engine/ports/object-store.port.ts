import type { ResultAsync } from 'neverthrow';

export type ObjectStoreError =
  | { readonly code: 'OBJECT_NOT_FOUND'; readonly message: string }
  | { readonly code: 'OBJECT_STORE_TIMEOUT'; readonly message: string }
  | { readonly code: 'OBJECT_STORE_IO_ERROR'; readonly message: string };

export interface RemoteFile {
  readonly name: string;
  readonly sizeBytes: number;
}

/**
 * Port: minimal remote object store.
 *
 * Keys are `/`-separated and relative to the configured remote root. Listing a
 * prefix that does not exist returns an empty list. Only direct children are
 * listed, so listing one namespace never touches another.
 */
export interface ObjectStorePort {
  /** Child "directory" names under `prefix`. */
  listDirs(prefix: string): ResultAsync<readonly string[], ObjectStoreError>;
  /** Child files under `prefix` with their sizes. */
  listFiles(prefix: string): ResultAsync<readonly RemoteFile[], ObjectStoreError>;
  copyIn(localPath: string, key: string): ResultAsync<void, ObjectStoreError>;
  /** `OBJECT_NOT_FOUND` when the key does not exist. */
  copyOut(key: string, localPath: string): ResultAsync<void, ObjectStoreError>;
  /** Missing keys are not an error. */
  deleteFile(key: string): ResultAsync<void, ObjectStoreError>;
  /** Missing prefixes are not an error. */
  deleteRecursive(prefix: string): ResultAsync<void, ObjectStoreError>;
}
