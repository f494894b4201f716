/**
 * Engine errors as CLI results.
 *
 * Prints kind, code and snapshot id; never a stack trace. `invalid_input`
 * exits with 2, everything else with 1.
 */

import type { EngineError } from '../engine/domain/errors.js';
import type { RestoreFailure } from '../engine/domain/restore-state.js';
import { leavesApplicationStopped } from '../engine/domain/restore-state.js';
import type { CliResult } from './types/cli-result.js';
import { failure } from './types/cli-result.js';
import { assertNever } from '../runtime/assert-never.js';

export function describeEngineError(error: EngineError): string[] {
  const details = [`kind: ${error.kind}`, `code: ${error.code}`];
  if (error.snapshotId !== undefined) details.push(`snapshot: ${error.snapshotId}`);
  details.push(error.message);
  return details;
}

function suggestionsFor(error: EngineError): string[] {
  switch (error.kind) {
    case 'busy':
      return [`Another operation holds ${error.lockPath}; wait for it to finish`];
    case 'unreachable':
      return [`Check that the "${error.service}" service is running`];
    case 'sealing':
      return ['Check ENV_BACKUP_PASSPHRASE_FILE'];
    case 'transient_io':
      return ['The remote may be temporarily unavailable; retry later'];
    case 'corruption':
    case 'invalid_input':
    case 'local_io':
      return [];
    default:
      return assertNever(error);
  }
}

export function engineFailure(action: string, error: EngineError): CliResult {
  return failure(`${action} failed`, {
    exitCode: error.kind === 'invalid_input' ? { kind: 'misuse' } : { kind: 'general_error' },
    details: describeEngineError(error),
    suggestions: suggestionsFor(error),
  });
}

export function restoreFailure(failed: RestoreFailure): CliResult {
  const suggestions = suggestionsFor(failed.error);
  if (leavesApplicationStopped(failed)) {
    suggestions.unshift('The application was left stopped; fix the cause and run restore again');
  }
  return failure('Restore failed', {
    exitCode: failed.error.kind === 'invalid_input' ? { kind: 'misuse' } : { kind: 'general_error' },
    details: [...describeEngineError(failed.error), `phase reached: ${failed.phase}`],
    suggestions,
  });
}
