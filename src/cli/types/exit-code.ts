/**
 * Typed exit codes for CLI commands.
 * Prefer these over raw integers for type safety.
 */
export type ExitCode =
  | { kind: 'success' }        // 0 - successful execution
  | { kind: 'general_error' }  // 1 - the operation failed
  | { kind: 'misuse' };        // 2 - invalid input (bad arguments, unknown snapshot, etc)

/**
 * Convert ExitCode to ProcessTerminator's expected format.
 */
export function toProcessExitCode(
  exitCode: ExitCode
): { kind: 'success' } | { kind: 'failure' } | { kind: 'misuse' } {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
  }
}

/**
 * Convert ExitCode to numeric value for raw process.exit().
 * Only use this at composition root boundaries where DI is unavailable.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
  }
}
