import type { ResultAsync } from 'neverthrow';
import { errAsync } from 'neverthrow';
import type { StateDirPort } from '../../../ports/state-dir.port.js';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';
import type { TimeClockPort } from '../../../ports/time-clock.port.js';
import type { SnapshotLockHandle, SnapshotLockPort } from '../../../ports/snapshot-lock.port.js';
import type { Namespace } from '../../../domain/ids.js';
import type { EngineError } from '../../../domain/errors.js';
import { EngineErr } from '../../../domain/errors.js';

/**
 * Local, per-namespace single-operation lock.
 *
 * Locked behavior:
 * - fail fast if the lock file already exists
 * - no stale detection / no auto-breaking
 */
export class LocalSnapshotLock implements SnapshotLockPort {
  constructor(
    private readonly stateDir: StateDirPort,
    private readonly fs: FileSystemPort,
    private readonly clock: TimeClockPort
  ) {}

  acquire(ns: Namespace): ResultAsync<SnapshotLockHandle, EngineError> {
    const lockPath = this.stateDir.lockPath(ns);

    const mapFs = (e: FsError): EngineError => {
      if (e.code === 'FS_ALREADY_EXISTS') {
        return EngineErr.busy(lockPath, `Namespace ${ns} is locked by another operation (remove ${lockPath} if no operation is running)`);
      }
      return EngineErr.localIo('LOCAL_IO_ERROR', e.message);
    };

    return this.fs
      .mkdirp(this.stateDir.namespaceDir(ns))
      .andThen(() =>
        this.fs.openExclusive(
          lockPath,
          new TextEncoder().encode(
            JSON.stringify({
              v: 1,
              namespace: ns,
              pid: this.clock.getPid(),
              startedAtMs: this.clock.nowMs(),
            })
          )
        )
      )
      .andThen(({ fd }) =>
        this.fs
          .fsyncFile(fd)
          .orElse((e) => this.fs.closeFile(fd).orElse(() => errAsync(e)).andThen(() => errAsync(e)))
          .andThen(() => this.fs.closeFile(fd))
      )
      .mapErr(mapFs)
      .map((): SnapshotLockHandle => ({ kind: 'snapshot_lock_handle', namespace: ns, lockPath }));
  }

  release(handle: SnapshotLockHandle): ResultAsync<void, EngineError> {
    return this.fs
      .unlink(handle.lockPath)
      .mapErr((e) => EngineErr.localIo('LOCAL_IO_ERROR', e.message));
  }
}
