import * as fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import * as path from 'node:path';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, errAsync } from 'neverthrow';
import type { ObjectStoreError, ObjectStorePort, RemoteFile } from '../../../ports/object-store.port.js';
import { nodeErrorCode } from '../../../../runtime/node-error-code.js';

function mapError(e: unknown, key: string): ObjectStoreError {
  if (nodeErrorCode(e) === 'ENOENT') return { code: 'OBJECT_NOT_FOUND', message: `Not found: ${key}` };
  return { code: 'OBJECT_STORE_IO_ERROR', message: `${key}: ${e instanceof Error ? e.message : String(e)}` };
}

/**
 * Object store backed by a local directory tree (a mounted NAS share, an
 * external disk, or a temp dir in tests). Keys map to paths under `root`.
 */
export class LocalDirectoryObjectStore implements ObjectStorePort {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  listDirs(prefix: string): ResultAsync<readonly string[], ObjectStoreError> {
    return this.withPath(prefix, (abs) =>
      RA.fromPromise(this.readEntries(abs), (e) => mapError(e, prefix)).map((entries) =>
        entries.filter((d) => d.isDirectory()).map((d) => d.name).sort()
      )
    );
  }

  listFiles(prefix: string): ResultAsync<readonly RemoteFile[], ObjectStoreError> {
    return this.withPath(prefix, (abs) =>
      RA.fromPromise(
        (async () => {
          const files: RemoteFile[] = [];
          for (const d of await this.readEntries(abs)) {
            if (!d.isFile() || d.name.endsWith('.partial')) continue;
            const st = await fs.stat(path.join(abs, d.name));
            files.push({ name: d.name, sizeBytes: st.size });
          }
          return files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
        })(),
        (e) => mapError(e, prefix)
      )
    );
  }

  copyIn(localPath: string, key: string): ResultAsync<void, ObjectStoreError> {
    return this.withPath(key, (abs) => {
      const partial = `${abs}.partial`;
      return RA.fromPromise(
        (async () => {
          await fs.mkdir(path.dirname(abs), { recursive: true });
          await fs.copyFile(localPath, partial);
          await fs.rename(partial, abs);
        })(),
        (e) => mapError(e, key)
      );
    });
  }

  copyOut(key: string, localPath: string): ResultAsync<void, ObjectStoreError> {
    return this.withPath(key, (abs) =>
      RA.fromPromise(
        (async () => {
          await fs.mkdir(path.dirname(localPath), { recursive: true });
          await fs.copyFile(abs, localPath);
        })(),
        (e) => mapError(e, key)
      )
    );
  }

  deleteFile(key: string): ResultAsync<void, ObjectStoreError> {
    return this.withPath(key, (abs) => RA.fromPromise(fs.rm(abs, { force: true }), (e) => mapError(e, key)));
  }

  deleteRecursive(prefix: string): ResultAsync<void, ObjectStoreError> {
    return this.withPath(prefix, (abs) =>
      RA.fromPromise(fs.rm(abs, { recursive: true, force: true }), (e) => mapError(e, prefix))
    );
  }

  private async readEntries(abs: string): Promise<Dirent[]> {
    try {
      return await fs.readdir(abs, { withFileTypes: true });
    } catch (e) {
      if (nodeErrorCode(e) === 'ENOENT') return [];
      throw e;
    }
  }

  private withPath<T>(
    key: string,
    run: (abs: string) => ResultAsync<T, ObjectStoreError>
  ): ResultAsync<T, ObjectStoreError> {
    const abs = path.resolve(this.root, key);
    if (abs !== this.root && !abs.startsWith(`${this.root}${path.sep}`)) {
      return errAsync({ code: 'OBJECT_STORE_IO_ERROR', message: `Key escapes the store root: ${key}` });
    }
    return run(abs);
  }
}
