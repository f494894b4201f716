import type { ResultAsync } from 'neverthrow';
import { okAsync, errAsync } from 'neverthrow';
import type { ObjectStoreError, ObjectStorePort, RemoteFile } from '../../ports/object-store.port.js';
import type { ProcessError, ProcessOutcome, ProcessRunner } from '../process/run-process.js';

export interface RcloneObjectStoreOptions {
  /** Configured rclone remote name, without the trailing colon. */
  readonly remoteName: string;
  /** Base path on the remote; may be empty. */
  readonly remotePath: string;
  /** Hard kill for a single rclone invocation. */
  readonly timeoutMs: number;
  readonly binary?: string;
}

/**
 * rclone exit codes that mean "nothing there": 3 directory not found, 4 file not found.
 * See `rclone help flags` / docs "Exit Code".
 */
const NOT_FOUND_EXIT_CODES: ReadonlySet<number> = new Set([3, 4]);

/**
 * Object store over the rclone CLI.
 *
 * - listDirs: `lsf --dirs-only`
 * - listFiles: `lsf --files-only --format sp` (size;path)
 * - copyIn/copyOut: `copyto`
 * - deleteFile: `deletefile`
 * - deleteRecursive: `purge`
 *
 * Retries live in the remote client; rclone's own low-level retries are kept at 1
 * so one invocation maps to one attempt.
 */
export class RcloneObjectStore implements ObjectStorePort {
  private readonly binary: string;

  constructor(
    private readonly options: RcloneObjectStoreOptions,
    private readonly run: ProcessRunner
  ) {
    this.binary = options.binary ?? 'rclone';
  }

  listDirs(prefix: string): ResultAsync<readonly string[], ObjectStoreError> {
    return this.rclone(['lsf', '--dirs-only', this.remote(prefix)], prefix).map((out) =>
      out === null
        ? []
        : out.stdout
            .split('\n')
            .map((l) => l.trim().replace(/\/$/, ''))
            .filter((l) => l.length > 0)
            .sort()
    );
  }

  listFiles(prefix: string): ResultAsync<readonly RemoteFile[], ObjectStoreError> {
    return this.rclone(
      ['lsf', '--files-only', '--format', 'sp', '--separator', ';', this.remote(prefix)],
      prefix
    ).andThen((out): ResultAsync<readonly RemoteFile[], ObjectStoreError> => {
      if (out === null) return okAsync([]);
      const files: RemoteFile[] = [];
      for (const line of out.stdout.split('\n')) {
        if (line.trim().length === 0) continue;
        const sep = line.indexOf(';');
        const sizeBytes = Number(line.slice(0, sep));
        if (sep < 0 || !Number.isInteger(sizeBytes)) {
          return errAsync({ code: 'OBJECT_STORE_IO_ERROR', message: `Unexpected rclone lsf line: ${line}` });
        }
        files.push({ name: line.slice(sep + 1), sizeBytes });
      }
      return okAsync(files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)));
    });
  }

  copyIn(localPath: string, key: string): ResultAsync<void, ObjectStoreError> {
    return this.rclone(['copyto', localPath, this.remote(key)], key).andThen((out): ResultAsync<void, ObjectStoreError> =>
      out === null ? errAsync(notFound(localPath)) : okAsync(undefined)
    );
  }

  copyOut(key: string, localPath: string): ResultAsync<void, ObjectStoreError> {
    return this.rclone(['copyto', this.remote(key), localPath], key).andThen((out): ResultAsync<void, ObjectStoreError> =>
      out === null ? errAsync(notFound(key)) : okAsync(undefined)
    );
  }

  deleteFile(key: string): ResultAsync<void, ObjectStoreError> {
    return this.rclone(['deletefile', this.remote(key)], key).map(() => undefined);
  }

  deleteRecursive(prefix: string): ResultAsync<void, ObjectStoreError> {
    return this.rclone(['purge', this.remote(prefix)], prefix).map(() => undefined);
  }

  private remote(key: string): string {
    const base = this.options.remotePath.replace(/^\/+|\/+$/g, '');
    const joined = [base, key.replace(/^\/+|\/+$/g, '')].filter((s) => s.length > 0).join('/');
    return `${this.options.remoteName}:${joined}`;
  }

  /** `null` when rclone reported "not found". */
  private rclone(args: readonly string[], key: string): ResultAsync<ProcessOutcome | null, ObjectStoreError> {
    return this.run(this.binary, [...args, '--low-level-retries', '1', '--retries', '1'], {
      timeoutMs: this.options.timeoutMs,
    })
      .mapErr((e: ProcessError): ObjectStoreError =>
        e.code === 'PROCESS_TIMED_OUT'
          ? { code: 'OBJECT_STORE_TIMEOUT', message: e.message }
          : { code: 'OBJECT_STORE_IO_ERROR', message: e.message }
      )
      .andThen((out): ResultAsync<ProcessOutcome | null, ObjectStoreError> => {
        if (out.exitCode === 0) return okAsync(out);
        if (NOT_FOUND_EXIT_CODES.has(out.exitCode)) return okAsync(null);
        return errAsync({
          code: 'OBJECT_STORE_IO_ERROR',
          message: `rclone ${args[0] ?? ''} ${key} exited ${out.exitCode}: ${out.stderr || '(no output)'}`,
        });
      });
  }
}

function notFound(key: string): ObjectStoreError {
  return { code: 'OBJECT_NOT_FOUND', message: `Not found: ${key}` };
}
