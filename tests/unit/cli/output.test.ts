import chalk from 'chalk';
import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { formatResult } from '../../../src/cli/output-formatter.js';
import { interpretCliResult } from '../../../src/cli/interpret-result.js';
import { formatBytes } from '../../../src/cli/format-bytes.js';
import { failure, misuse, success, successMessage } from '../../../src/cli/types/cli-result.js';
import { toNumericExitCode } from '../../../src/cli/types/exit-code.js';
import { ThrowingProcessTerminator } from '../../../src/runtime/adapters/throwing-process-terminator.js';

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatBytes', () => {
  it.each([
    [0, '0 B'],
    [1023, '1023 B'],
    [1024, '1.0 KiB'],
    [1536, '1.5 KiB'],
    [5 * 1024 * 1024, '5.0 MiB'],
    [3 * 1024 ** 5, '3072.0 TiB'],
  ])('%d -> %s', (bytes, text) => {
    expect(formatBytes(bytes)).toBe(text);
  });
});

describe('formatResult', () => {
  it('renders every section of a success', () => {
    const text = formatResult(
      success({ message: 'Done', details: ['a', 'b'], warnings: ['careful'], suggestions: ['next'] })
    );
    expect(text.split('\n')).toEqual([
      '✅ Done',
      '',
      '  • a',
      '  • b',
      '',
      '⚠️  Warnings:',
      '  • careful',
      '',
      '💡 Suggestions:',
      '  • next',
    ]);
  });

  it('renders a failure without empty sections', () => {
    expect(formatResult(failure('Prune failed', { details: [] }))).toBe('❌ Prune failed');
  });

  it('renders nothing for a bare success', () => {
    expect(formatResult(success())).toBe('');
  });
});

describe('exit codes', () => {
  it('maps to the conventional numbers', () => {
    expect(toNumericExitCode({ kind: 'success' })).toBe(0);
    expect(toNumericExitCode({ kind: 'general_error' })).toBe(1);
    expect(toNumericExitCode({ kind: 'misuse' })).toBe(2);
  });
});

describe('interpretCliResult', () => {
  it('prints successes to stdout and returns', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    interpretCliResult(successMessage('ok'), new ThrowingProcessTerminator());
    expect(log).toHaveBeenCalledWith('✅ ok');
  });

  it('prints failures to stderr and terminates with the mapped code', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(() => interpretCliResult(misuse('bad id'), new ThrowingProcessTerminator())).toThrow(
      '[ProcessTerminator] terminate(misuse)'
    );
    expect(error).toHaveBeenCalledWith('❌ bad id');
  });
});
