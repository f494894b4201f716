import * as path from 'node:path';
import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA, okAsync, errAsync, ok, err } from 'neverthrow';
import type { ObjectStoreError, ObjectStorePort, RemoteFile } from '../ports/object-store.port.js';
import type { FileSystemPort, FsError } from '../ports/fs.port.js';
import type { FileHasherPort } from '../ports/file-hasher.port.js';
import type { Namespace, SnapshotId } from '../domain/ids.js';
import { parseSnapshotId, snapshotIdToEpochMs } from '../domain/ids.js';
import type { SnapshotManifest, ArtifactRecord } from '../domain/manifest.js';
import { MANIFEST_FILE, parseManifest, referencedFiles } from '../domain/manifest.js';
import type { IncompleteCandidate } from '../domain/retention.js';
import type { EngineError } from '../domain/errors.js';
import { EngineErr, describeUnknown } from '../domain/errors.js';
import type { RetryPolicy } from '../../runtime/with-retry.js';
import { withRetry } from '../../runtime/with-retry.js';
import { withTimeout, TimeoutError } from '../../runtime/with-timeout.js';
import type { Sleep } from '../../runtime/sleep.js';
import type { Logger } from '../../core/logging/index.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface RemoteClientOptions {
  /** Bound on one primitive call, retries excluded. */
  readonly timeoutMs: number;
  readonly retry: RetryPolicy;
}

export type UploadOutcome =
  | { readonly kind: 'uploaded'; readonly files: readonly RemoteFile[] }
  | { readonly kind: 'already_present'; readonly files: readonly RemoteFile[] };

export interface RemoteListing {
  /** Snapshots whose manifest is present, oldest first. */
  readonly complete: readonly SnapshotId[];
  /** Directories without a manifest (interrupted uploads). */
  readonly incomplete: readonly IncompleteCandidate[];
}

const localIo = (e: FsError): EngineError => EngineErr.localIo('LOCAL_IO_ERROR', e.message);

function byName(a: RemoteFile, b: RemoteFile): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function sameListing(a: readonly RemoteFile[], b: readonly RemoteFile[]): boolean {
  if (a.length !== b.length) return false;
  const left = [...a].sort(byName);
  const right = [...b].sort(byName);
  return left.every((f, i) => f.name === right[i]?.name && f.sizeBytes === right[i]?.sizeBytes);
}

/**
 * Snapshot-level operations on the remote, namespaced as
 * `<namespace>/<snapshotId>/<artifact>`.
 *
 * Every primitive call is bounded by a timeout and retried with exponential
 * backoff while it fails transiently. Missing objects are never retried.
 */
export class RemoteSnapshotClient {
  constructor(
    private readonly store: ObjectStorePort,
    private readonly fs: FileSystemPort,
    private readonly hasher: FileHasherPort,
    private readonly sleep: Sleep,
    private readonly logger: Logger,
    private readonly options: RemoteClientOptions
  ) {}

  list(ns: Namespace): ResultAsync<readonly SnapshotId[], EngineError> {
    return this.scan(ns).map((l) => l.complete);
  }

  scan(ns: Namespace): ResultAsync<RemoteListing, EngineError> {
    return this.call(`list ${ns}`, () => this.store.listDirs(ns)).andThen((dirs) => {
      const run = async (): Promise<Result<RemoteListing, EngineError>> => {
        const complete: SnapshotId[] = [];
        const incomplete: IncompleteCandidate[] = [];
        for (const name of dirs) {
          const files = await this.listSnapshotFiles(ns, name);
          if (files.isErr()) return err(files.error);
          const id = parseSnapshotId(name);
          if (id !== null && files.value.some((f) => f.name === MANIFEST_FILE)) complete.push(id);
          else incomplete.push({ name, createdAtMs: id === null ? null : snapshotIdToEpochMs(id) });
        }
        complete.sort();
        return ok({ complete, incomplete });
      };
      return new RA(run());
    });
  }

  /**
   * Fetch and validate one manifest. `null` when the snapshot has none.
   */
  readManifest(ns: Namespace, id: SnapshotId, workDir: string): ResultAsync<SnapshotManifest | null, EngineError> {
    const dir = path.join(workDir, 'manifests');
    const local = path.join(dir, `${id}.json`);
    return this.fs
      .mkdirp(dir)
      .mapErr(localIo)
      .andThen(() => this.fetch(this.key(ns, id, MANIFEST_FILE), local))
      .andThen((found): ResultAsync<SnapshotManifest | null, EngineError> => {
        if (!found) return okAsync(null);
        return this.fs
          .readFileUtf8(local)
          .mapErr(localIo)
          .andThen((raw) => parseManifest(raw, `${ns}/${id}/${MANIFEST_FILE}`))
          .andThen((manifest): ResultAsync<SnapshotManifest, EngineError> =>
            manifest.id === id
              ? okAsync(manifest)
              : errAsync(
                  EngineErr.corruption('MANIFEST_INVALID', `Manifest under ${id} describes ${manifest.id}`, id)
                )
          );
      });
  }

  /**
   * Artifacts first, manifest last, then re-list and compare with staging.
   *
   * A snapshot that is already completely present with the same listing is
   * left alone; one present with a different listing is a conflict.
   */
  upload(ns: Namespace, id: SnapshotId, stagingDir: string): ResultAsync<UploadOutcome, EngineError> {
    return this.stagedFiles(stagingDir).andThen((staged): ResultAsync<UploadOutcome, EngineError> => {
      if (!staged.some((f) => f.name === MANIFEST_FILE)) {
        return errAsync(EngineErr.localIo('LOCAL_IO_ERROR', `Staging ${stagingDir} has no manifest`));
      }

      return this.listSnapshotFiles(ns, id).andThen((existing): ResultAsync<UploadOutcome, EngineError> => {
        if (existing.some((f) => f.name === MANIFEST_FILE)) {
          if (sameListing(existing, staged)) {
            this.logger.info({ namespace: ns, snapshotId: id }, 'snapshot already uploaded');
            return okAsync({ kind: 'already_present', files: existing });
          }
          return errAsync(
            EngineErr.corruption('REMOTE_CONFLICT', `Remote ${ns}/${id} exists with different contents`, id)
          );
        }

        const ordered = [
          ...staged.filter((f) => f.name !== MANIFEST_FILE),
          ...staged.filter((f) => f.name === MANIFEST_FILE),
        ];
        const copyAll = ordered.reduce<ResultAsync<void, EngineError>>(
          (acc, file) =>
            acc.andThen(() =>
              this.call(`upload ${id}/${file.name}`, () =>
                this.store.copyIn(path.join(stagingDir, file.name), this.key(ns, id, file.name))
              )
            ),
          okAsync(undefined)
        );

        return copyAll
          .andThen(() => this.listSnapshotFiles(ns, id))
          .andThen((uploaded): ResultAsync<UploadOutcome, EngineError> =>
            sameListing(uploaded, staged)
              ? okAsync({ kind: 'uploaded', files: uploaded })
              : errAsync(
                  EngineErr.transientIo(
                    'UPLOAD_MISMATCH',
                    `Remote listing of ${ns}/${id} does not match staging after upload`,
                    id
                  )
                )
          );
      });
    });
  }

  /**
   * Download the manifest and every referenced artifact into `targetDir`,
   * checking each file's size and sha256 against the manifest.
   */
  download(ns: Namespace, id: SnapshotId, targetDir: string): ResultAsync<SnapshotManifest, EngineError> {
    return this.fs
      .mkdirp(targetDir)
      .mapErr(localIo)
      .andThen(() => this.readManifest(ns, id, targetDir))
      .andThen((manifest): ResultAsync<SnapshotManifest, EngineError> => {
        if (manifest === null) {
          return errAsync(EngineErr.invalidInput('SNAPSHOT_NOT_FOUND', `Snapshot ${id} does not exist`, id));
        }
        return referencedFiles(manifest)
          .reduce<ResultAsync<void, EngineError>>(
            (acc, { record }) => acc.andThen(() => this.downloadArtifact(ns, id, record, targetDir).map(() => undefined)),
            okAsync(undefined)
          )
          .map(() => manifest);
      });
  }

  /** Fetch one artifact and verify it; returns the local path. */
  downloadArtifact(
    ns: Namespace,
    id: SnapshotId,
    record: ArtifactRecord,
    targetDir: string
  ): ResultAsync<string, EngineError> {
    const local = path.join(targetDir, record.file);
    return this.fetch(this.key(ns, id, record.file), local)
      .andThen((found): ResultAsync<void, EngineError> =>
        found
          ? okAsync(undefined)
          : errAsync(EngineErr.corruption('CHAIN_BROKEN', `Snapshot ${id} is missing artifact ${record.file}`, id))
      )
      .andThen(() => this.hasher.hashFile(local))
      .andThen((digest): ResultAsync<string, EngineError> => {
        if (digest.sizeBytes !== record.sizeBytes) {
          return errAsync(
            EngineErr.corruption(
              'SIZE_MISMATCH',
              `${id}/${record.file}: expected ${record.sizeBytes} bytes, got ${digest.sizeBytes}`,
              id
            )
          );
        }
        if (digest.sha256 !== record.sha256) {
          return errAsync(
            EngineErr.corruption('CHECKSUM_MISMATCH', `${id}/${record.file}: sha256 does not match the manifest`, id)
          );
        }
        return okAsync(local);
      });
  }

  /** Manifest first, so a half-deleted snapshot is never listed as complete. */
  delete(ns: Namespace, id: SnapshotId): ResultAsync<void, EngineError> {
    return this.call(`delete ${id}/${MANIFEST_FILE}`, () => this.store.deleteFile(this.key(ns, id, MANIFEST_FILE)))
      .andThen(() => this.call(`delete ${id}`, () => this.store.deleteRecursive(`${ns}/${id}`)))
      .map(() => {
        this.logger.info({ namespace: ns, snapshotId: id }, 'snapshot deleted');
      });
  }

  deleteIncomplete(ns: Namespace, name: string): ResultAsync<void, EngineError> {
    return this.call(`delete ${name}`, () => this.store.deleteRecursive(`${ns}/${name}`)).map(() => {
      this.logger.info({ namespace: ns, directory: name }, 'incomplete snapshot directory deleted');
    });
  }

  private key(ns: Namespace, id: SnapshotId, file: string): string {
    return `${ns}/${id}/${file}`;
  }

  private listSnapshotFiles(ns: Namespace, name: string): ResultAsync<readonly RemoteFile[], EngineError> {
    return this.call(`list ${name}`, () => this.store.listFiles(`${ns}/${name}`));
  }

  /** `false` when the remote object does not exist. */
  private fetch(key: string, localPath: string): ResultAsync<boolean, EngineError> {
    return this.attempt(`download ${key}`, () => this.store.copyOut(key, localPath)).andThen(
      (outcome): ResultAsync<boolean, EngineError> => (outcome === 'not_found' ? okAsync(false) : okAsync(true))
    );
  }

  private stagedFiles(stagingDir: string): ResultAsync<readonly RemoteFile[], EngineError> {
    return this.fs
      .readdir(stagingDir)
      .mapErr(localIo)
      .andThen((names) =>
        RA.combine(
          [...names].sort().map((name) =>
            this.fs
              .stat(path.join(stagingDir, name))
              .mapErr(localIo)
              .map((st): RemoteFile | null => (st.isDirectory ? null : { name, sizeBytes: st.sizeBytes }))
          )
        )
      )
      .map((files) => files.filter((f): f is RemoteFile => f !== null));
  }

  /** Like `attempt`, but a missing object is an error. */
  private call<T>(label: string, op: () => ResultAsync<T, ObjectStoreError>): ResultAsync<T, EngineError> {
    return this.attempt(label, op).andThen((outcome): ResultAsync<T, EngineError> =>
      outcome === 'not_found'
        ? errAsync(EngineErr.transientIo('REMOTE_IO_ERROR', `${label}: remote object not found`))
        : okAsync(outcome.value)
    );
  }

  private attempt<T>(
    label: string,
    op: () => ResultAsync<T, ObjectStoreError>
  ): ResultAsync<{ readonly value: T } | 'not_found', EngineError> {
    const once = (): ResultAsync<{ readonly value: T } | 'not_found', ObjectStoreError> =>
      RA.fromPromise(withTimeout(Promise.resolve(op()), this.options.timeoutMs, label), (e): ObjectStoreError =>
        e instanceof TimeoutError
          ? { code: 'OBJECT_STORE_TIMEOUT', message: e.message }
          : { code: 'OBJECT_STORE_IO_ERROR', message: `${label}: ${describeUnknown(e)}` }
      )
        .andThen((r) => r)
        .map((value): { readonly value: T } | 'not_found' => ({ value }))
        .orElse((e): ResultAsync<{ readonly value: T } | 'not_found', ObjectStoreError> =>
          e.code === 'OBJECT_NOT_FOUND' ? okAsync('not_found') : errAsync(e)
        );

    return withRetry(once, {
      policy: this.options.retry,
      sleep: this.sleep,
      isRetryable: (e) => e.code !== 'OBJECT_NOT_FOUND',
      onRetry: ({ attempt, delayMs, error }) =>
        this.logger.warn({ attempt, delayMs, code: error.code, operation: label }, 'remote call failed, retrying'),
    }).mapErr((e): EngineError => {
      switch (e.code) {
        case 'OBJECT_STORE_TIMEOUT':
          return EngineErr.transientIo('REMOTE_TIMEOUT', `${label}: ${e.message}`);
        case 'OBJECT_STORE_IO_ERROR':
        case 'OBJECT_NOT_FOUND':
          return EngineErr.transientIo('REMOTE_IO_ERROR', `${label}: ${e.message}`);
        default:
          return assertNever(e);
      }
    });
  }
}
