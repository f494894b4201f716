import type { ResultAsync } from 'neverthrow';
import type { EngineError } from '../domain/errors.js';

export interface ExecIo {
  /** Streamed to the command's stdin. */
  readonly stdinFile?: string;
  /** The command's stdout is written here instead of being captured. */
  readonly stdoutFile?: string;
}

export interface ExecOutcome {
  readonly exitCode: number;
  /** Empty when `stdoutFile` was given. */
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Port: the container runtime hosting the application stack.
 *
 * Failures to reach the runtime itself are `unreachable` errors. A command that
 * ran and exited non-zero is reported in `ExecOutcome`, not as an error.
 */
export interface ContainerRuntimePort {
  down(): ResultAsync<void, EngineError>;
  /** All services when `services` is omitted. */
  up(services?: readonly string[]): ResultAsync<void, EngineError>;
  exec(service: string, argv: readonly string[], io?: ExecIo): ResultAsync<ExecOutcome, EngineError>;
  isHealthy(service: string): ResultAsync<boolean, EngineError>;
  /** Image tag of the running service, `null` when it is not running. */
  imageTag(service: string): ResultAsync<string | null, EngineError>;
}
