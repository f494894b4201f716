import type { EngineError } from './errors.js';

/**
 * Restore progress, in order. The application is brought down before any
 * mutation and only started again once the database is back.
 */
export type RestorePhase = 'running' | 'stopped' | 'domains_restored' | 'database_restored' | 'started';

export const RESTORE_PHASES: readonly RestorePhase[] = [
  'running',
  'stopped',
  'domains_restored',
  'database_restored',
  'started',
];

export function nextRestorePhase(phase: RestorePhase): RestorePhase | null {
  const index = RESTORE_PHASES.indexOf(phase);
  return RESTORE_PHASES[index + 1] ?? null;
}

/**
 * A failed restore reports the last phase it completed. Anything before
 * `started` means the application was left stopped.
 */
export interface RestoreFailure {
  readonly phase: RestorePhase;
  readonly error: EngineError;
}

export function leavesApplicationStopped(failure: RestoreFailure): boolean {
  return failure.phase !== 'running' && failure.phase !== 'started';
}
