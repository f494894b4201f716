import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_UNSUPPORTED'; readonly message: string };

/**
 * Port: Directory operations.
 * Used by: token store, snapshot lock, staging.
 */
export interface DirectoryOpsPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError>;
  fsyncDir(dirPath: string): ResultAsync<void, FsError>;
  /** Entry names (not paths). */
  readdir(dirPath: string): ResultAsync<readonly string[], FsError>;
  /** `rm -rf`; missing paths are not an error. */
  removeTree(targetPath: string): ResultAsync<void, FsError>;
}

/**
 * Port: File reading and metadata.
 */
export interface FileReadPort {
  readFileUtf8(filePath: string): ResultAsync<string, FsError>;
  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError>;
  stat(filePath: string): ResultAsync<{ readonly sizeBytes: number; readonly isDirectory: boolean }, FsError>;
}

/**
 * Port: File descriptor operations for crash-safe writes.
 */
export interface FileDescriptorPort {
  openWriteTruncate(filePath: string): ResultAsync<{ readonly fd: number }, FsError>;

  /**
   * Create file exclusively (fails with FS_ALREADY_EXISTS if it exists). Used for lock files.
   */
  openExclusive(filePath: string, bytes: Uint8Array): ResultAsync<{ readonly fd: number }, FsError>;

  writeAll(fd: number, bytes: Uint8Array): ResultAsync<void, FsError>;
  fsyncFile(fd: number): ResultAsync<void, FsError>;
  closeFile(fd: number): ResultAsync<void, FsError>;
}

export interface FileManipulationPort {
  rename(fromPath: string, toPath: string): ResultAsync<void, FsError>;
  unlink(filePath: string): ResultAsync<void, FsError>;
  writeFileBytes(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError>;
  copyFile(fromPath: string, toPath: string): ResultAsync<void, FsError>;
}

export interface FileSystemPort extends DirectoryOpsPort, FileReadPort, FileDescriptorPort, FileManipulationPort {}
