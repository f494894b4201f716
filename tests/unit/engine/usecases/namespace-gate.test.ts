import { describe, expect, it } from 'vitest';
import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync } from 'neverthrow';
import type { Namespace } from '../../../../src/engine/domain/ids.js';
import { parseNamespace } from '../../../../src/engine/domain/ids.js';
import type { EngineError } from '../../../../src/engine/domain/errors.js';
import { EngineErr } from '../../../../src/engine/domain/errors.js';
import type { SnapshotLockHandle, SnapshotLockPort } from '../../../../src/engine/ports/snapshot-lock.port.js';
import { NamespaceGate } from '../../../../src/engine/usecases/namespace-gate.js';
import { expectErr, expectOk } from '../../../helpers/result-helpers.js';
import { CapturingLoggerFactory } from '../../../helpers/test-logger.js';

class MemoryLock implements SnapshotLockPort {
  readonly held = new Set<string>();
  failRelease = false;

  acquire(ns: Namespace): ResultAsync<SnapshotLockHandle, EngineError> {
    if (this.held.has(ns)) return errAsync(EngineErr.busy(`/state/${ns}/lock`, `Namespace ${ns} is locked`));
    this.held.add(ns);
    return okAsync({ kind: 'snapshot_lock_handle', namespace: ns, lockPath: `/state/${ns}/lock` });
  }

  release(handle: SnapshotLockHandle): ResultAsync<void, EngineError> {
    if (this.failRelease) return errAsync(EngineErr.localIo('LOCAL_IO_ERROR', 'unlink failed'));
    this.held.delete(handle.namespace);
    return okAsync(undefined);
  }
}

const parsed = parseNamespace('home/paperless');
if (parsed === null) throw new Error('bad test namespace');
const NS: Namespace = parsed;

describe('NamespaceGate', () => {
  function setup(): { lock: MemoryLock; gate: NamespaceGate; logs: CapturingLoggerFactory } {
    const lock = new MemoryLock();
    const logs = new CapturingLoggerFactory();
    return { lock, gate: new NamespaceGate(lock, logs.create('gate')), logs };
  }

  it('holds the lock for the duration of the operation', async () => {
    const { lock, gate } = setup();
    const value = expectOk(
      await gate.withNamespaceLock(NS, (handle) => {
        expect(lock.held.has(NS)).toBe(true);
        return okAsync(handle.lockPath);
      }),
      'locked operation'
    );
    expect(value).toBe('/state/home/paperless/lock');
    expect(lock.held.size).toBe(0);
  });

  it('releases the lock when the operation fails', async () => {
    const { lock, gate } = setup();
    const error = expectErr(
      await gate.withNamespaceLock(NS, () => errAsync(EngineErr.invalidInput('INVALID_ARGUMENT', 'nope'))),
      'failing operation'
    );
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(lock.held.size).toBe(0);
  });

  it('releases the lock when the operation throws', async () => {
    const { lock, gate } = setup();
    const error = expectErr(
      await gate.withNamespaceLock(NS, () => {
        throw new Error('boom');
      }),
      'throwing operation'
    );
    expect(error).toEqual({
      kind: 'local_io',
      code: 'LOCAL_IO_ERROR',
      message: 'Operation on home/paperless threw: boom',
    });
    expect(lock.held.size).toBe(0);
  });

  it('refuses to nest on the same namespace', async () => {
    const { gate } = setup();
    const error = expectErr(
      await gate.withNamespaceLock(NS, () => gate.withNamespaceLock(NS, () => okAsync('never'))),
      'nested operation'
    );
    expect(error.kind).toBe('busy');
    expect(error.message).toBe('Namespace home/paperless is already locked by this process');
  });

  it('reports busy when another holder has the lock', async () => {
    const { lock, gate } = setup();
    lock.held.add(NS);
    const error = expectErr(await gate.withNamespaceLock(NS, () => okAsync(1)), 'locked elsewhere');
    expect(error.kind).toBe('busy');
  });

  it('reports a release failure after a successful operation', async () => {
    const { lock, gate, logs } = setup();
    lock.failRelease = true;
    const error = expectErr(await gate.withNamespaceLock(NS, () => okAsync(1)), 'release failure');
    expect(error.message).toBe('unlink failed');
    expect(logs.messages()).toEqual(['failed to release lock']);
  });
});
