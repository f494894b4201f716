import * as fs from 'node:fs/promises';
import * as fsCb from 'node:fs';
import { constants as fsConstants } from 'node:fs';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';
import { nodeErrorCode } from '../../../../runtime/node-error-code.js';

function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EEXIST') return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

export class NodeFileSystem implements FileSystemPort {
  mkdirp(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.mkdir(dirPath, { recursive: true }).then(() => undefined), (e) => mapFsError(e, dirPath));
  }

  readdir(dirPath: string): ResultAsync<readonly string[], FsError> {
    return RA.fromPromise(fs.readdir(dirPath), (e) => mapFsError(e, dirPath));
  }

  removeTree(targetPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rm(targetPath, { recursive: true, force: true }), (e) => mapFsError(e, targetPath));
  }

  readFileUtf8(filePath: string): ResultAsync<string, FsError> {
    return RA.fromPromise(fs.readFile(filePath, 'utf8'), (e) => mapFsError(e, filePath));
  }

  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError> {
    return RA.fromPromise(fs.readFile(filePath), (e) => mapFsError(e, filePath)).map((b) => new Uint8Array(b));
  }

  writeFileBytes(filePath: string, bytes: Uint8Array): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.writeFile(filePath, bytes), (e) => mapFsError(e, filePath));
  }

  copyFile(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.copyFile(fromPath, toPath), (e) => mapFsError(e, `${fromPath} -> ${toPath}`));
  }

  openWriteTruncate(filePath: string): ResultAsync<{ readonly fd: number }, FsError> {
    return RA.fromPromise(
      new Promise<{ fd: number }>((resolve, reject) => {
        fsCb.open(filePath, fsConstants.O_CREAT | fsConstants.O_TRUNC | fsConstants.O_WRONLY, 0o600, (err, fd) => {
          if (err) reject(err);
          else resolve({ fd });
        });
      }),
      (e) => mapFsError(e, filePath)
    );
  }

  writeAll(fd: number, bytes: Uint8Array): ResultAsync<void, FsError> {
    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        fsCb.write(fd, bytes, 0, bytes.length, null, (err) => {
          if (err) reject(err);
          else resolve();
        });
      }),
      (e) => mapFsError(e, `fd:${fd}`)
    );
  }

  openExclusive(filePath: string, bytes: Uint8Array): ResultAsync<{ readonly fd: number }, FsError> {
    return RA.fromPromise(
      (async () => {
        // Low-level open guarantees exclusive create semantics.
        const fd = await new Promise<number>((resolve, reject) => {
          fsCb.open(filePath, fsConstants.O_CREAT | fsConstants.O_EXCL | fsConstants.O_WRONLY, 0o600, (err, opened) => {
            if (err) reject(err);
            else resolve(opened);
          });
        });

        await new Promise<void>((resolve, reject) => {
          fsCb.write(fd, bytes, 0, bytes.length, null, (err) => {
            if (err) reject(err);
            else resolve();
          });
        });

        return { fd };
      })(),
      (e) => mapFsError(e, filePath)
    );
  }

  fsyncFile(fd: number): ResultAsync<void, FsError> {
    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        fsCb.fsync(fd, (err) => (err ? reject(err) : resolve()));
      }),
      (e) => mapFsError(e, `fd:${fd}`)
    );
  }

  fsyncDir(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(
      (async () => {
        const dirHandle = await fs.open(dirPath, 'r');
        try {
          await dirHandle.sync();
        } finally {
          await dirHandle.close();
        }
      })(),
      (e): FsError => {
        const code = nodeErrorCode(e);
        if (code === 'EINVAL' || code === 'ENOTSUP' || code === 'EISDIR') {
          return { code: 'FS_UNSUPPORTED', message: `Directory fsync unsupported for: ${dirPath}` };
        }
        return mapFsError(e, dirPath);
      }
    );
  }

  closeFile(fd: number): ResultAsync<void, FsError> {
    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        fsCb.close(fd, (err) => (err ? reject(err) : resolve()));
      }),
      (e) => mapFsError(e, `fd:${fd}`)
    );
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rename(fromPath, toPath), (e) => mapFsError(e, `${fromPath} -> ${toPath}`));
  }

  unlink(filePath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.unlink(filePath), (e) => mapFsError(e, filePath));
  }

  stat(filePath: string): ResultAsync<{ readonly sizeBytes: number; readonly isDirectory: boolean }, FsError> {
    return RA.fromPromise(fs.stat(filePath), (e) => mapFsError(e, filePath)).map((s) => ({
      sizeBytes: s.size,
      isDirectory: s.isDirectory(),
    }));
  }
}
