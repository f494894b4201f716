/**
 * Port for terminating the current process.
 * This should only be used by composition roots / entrypoints.
 *
 * `misuse` is kept distinct from `failure` so scripting callers can tell
 * "the operation failed" apart from "the invocation was invalid".
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
