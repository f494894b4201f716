import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA, err, errAsync } from 'neverthrow';
import type { Namespace } from '../domain/ids.js';
import type { EngineError } from '../domain/errors.js';
import { EngineErr, describeUnknown } from '../domain/errors.js';
import type { SnapshotLockHandle, SnapshotLockPort } from '../ports/snapshot-lock.port.js';
import type { Logger } from '../../core/logging/index.js';

/**
 * Single choke point for mutating operations on a namespace (create, prune,
 * restore): the lock is held for exactly the lifetime of `fn` and released
 * whatever `fn` returns.
 */
export class NamespaceGate {
  private readonly active = new Set<Namespace>();

  constructor(
    private readonly lock: SnapshotLockPort,
    private readonly logger: Logger
  ) {}

  withNamespaceLock<T, E = EngineError>(
    ns: Namespace,
    fn: (handle: SnapshotLockHandle) => ResultAsync<T, E>
  ): ResultAsync<T, E | EngineError> {
    if (this.active.has(ns)) {
      return errAsync(EngineErr.busy(ns, `Namespace ${ns} is already locked by this process`));
    }
    this.active.add(ns);

    const run = async (): Promise<Result<T, E | EngineError>> => {
      try {
        const acquired = await this.lock.acquire(ns);
        if (acquired.isErr()) return err(acquired.error);
        const handle = acquired.value;

        let outcome: Result<T, E | EngineError>;
        try {
          outcome = await fn(handle);
        } catch (e) {
          outcome = err(EngineErr.localIo('LOCAL_IO_ERROR', `Operation on ${ns} threw: ${describeUnknown(e)}`));
        }

        const released = await this.lock.release(handle);
        if (released.isErr()) {
          this.logger.error({ namespace: ns, lockPath: handle.lockPath, err: released.error }, 'failed to release lock');
          // The operation's own failure is the more useful report.
          return outcome.isErr() ? outcome : err(released.error);
        }
        return outcome;
      } finally {
        this.active.delete(ns);
      }
    };

    return new RA(run());
  }
}
