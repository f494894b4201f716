import { describe, expect, it } from 'vitest';
import { errAsync, okAsync } from 'neverthrow';
import { RcloneObjectStore } from '../../../../src/engine/infra/rclone/index.js';
import type { ProcessOutcome, ProcessRunner } from '../../../../src/engine/infra/process/run-process.js';
import { expectErr, expectOk } from '../../../helpers/result-helpers.js';

interface Invocation {
  readonly command: string;
  readonly args: readonly string[];
  readonly timeoutMs: number;
}

function scripted(outcome: Partial<ProcessOutcome> = {}): { runner: ProcessRunner; invocations: Invocation[] } {
  const invocations: Invocation[] = [];
  const runner: ProcessRunner = (command, args, options) => {
    invocations.push({ command, args, timeoutMs: options.timeoutMs });
    return okAsync({ exitCode: 0, stdout: '', stderr: '', ...outcome });
  };
  return { runner, invocations };
}

const options = { remoteName: 'backup', remotePath: '/backups/', timeoutMs: 5000 };
const TAIL = ['--low-level-retries', '1', '--retries', '1'];

describe('RcloneObjectStore', () => {
  it('lists directories under the remote path', async () => {
    const { runner, invocations } = scripted({ stdout: 'b/\na/\n\n' });
    const store = new RcloneObjectStore(options, runner);

    expect(expectOk(await store.listDirs('home%2Fpaperless'), 'listDirs')).toEqual(['a', 'b']);
    expect(invocations).toEqual([
      {
        command: 'rclone',
        args: ['lsf', '--dirs-only', 'backup:backups/home%2Fpaperless', ...TAIL],
        timeoutMs: 5000,
      },
    ]);
  });

  it('parses size;path lines', async () => {
    const { runner, invocations } = scripted({ stdout: '42;media\n7;manifest.json\n' });
    const store = new RcloneObjectStore({ ...options, binary: '/usr/bin/rclone' }, runner);

    expect(expectOk(await store.listFiles('ns/2026-03-10_12-00-00'), 'listFiles')).toEqual([
      { name: 'manifest.json', sizeBytes: 7 },
      { name: 'media', sizeBytes: 42 },
    ]);
    expect(invocations[0]?.command).toBe('/usr/bin/rclone');
    expect(invocations[0]?.args).toEqual([
      'lsf',
      '--files-only',
      '--format',
      'sp',
      '--separator',
      ';',
      'backup:backups/ns/2026-03-10_12-00-00',
      ...TAIL,
    ]);
  });

  it('rejects unexpected listing lines', async () => {
    const store = new RcloneObjectStore(options, scripted({ stdout: 'garbage\n' }).runner);
    expect(expectErr(await store.listFiles('ns'), 'listFiles').message).toBe('Unexpected rclone lsf line: garbage');
  });

  it('treats not-found exit codes as empty listings', async () => {
    const store = new RcloneObjectStore(options, scripted({ exitCode: 3 }).runner);
    expect(expectOk(await store.listDirs('ns'), 'listDirs')).toEqual([]);
    expect(expectOk(await store.listFiles('ns'), 'listFiles')).toEqual([]);
  });

  it('maps a missing source of copyOut to OBJECT_NOT_FOUND', async () => {
    const store = new RcloneObjectStore(options, scripted({ exitCode: 4 }).runner);
    expect(expectErr(await store.copyOut('ns/x/media', '/tmp/media'), 'copyOut')).toEqual({
      code: 'OBJECT_NOT_FOUND',
      message: 'Not found: ns/x/media',
    });
  });

  it('reports other exit codes with stderr', async () => {
    const store = new RcloneObjectStore(options, scripted({ exitCode: 1, stderr: 'quota exceeded' }).runner);
    expect(expectErr(await store.copyIn('/tmp/media', 'ns/x/media'), 'copyIn')).toEqual({
      code: 'OBJECT_STORE_IO_ERROR',
      message: 'rclone copyto ns/x/media exited 1: quota exceeded',
    });
  });

  it('maps a process timeout', async () => {
    const runner: ProcessRunner = () =>
      errAsync({ code: 'PROCESS_TIMED_OUT', message: 'rclone purge timed out after 5000ms' });
    const store = new RcloneObjectStore(options, runner);
    expect(expectErr(await store.deleteRecursive('ns/x'), 'purge').code).toBe('OBJECT_STORE_TIMEOUT');
  });

  it('uses deletefile and purge for deletes', async () => {
    const { runner, invocations } = scripted({ exitCode: 3 });
    const store = new RcloneObjectStore({ ...options, remotePath: '' }, runner);
    expectOk(await store.deleteFile('ns/x/manifest.json'), 'deleteFile');
    expectOk(await store.deleteRecursive('ns/x'), 'deleteRecursive');
    expect(invocations.map((i) => i.args.slice(0, 2))).toEqual([
      ['deletefile', 'backup:ns/x/manifest.json'],
      ['purge', 'backup:ns/x'],
    ]);
  });
});
