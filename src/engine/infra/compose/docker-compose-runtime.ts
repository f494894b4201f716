import type { ResultAsync } from 'neverthrow';
import { okAsync, errAsync } from 'neverthrow';
import type { ContainerRuntimePort, ExecIo, ExecOutcome } from '../../ports/container-runtime.port.js';
import type { EngineError } from '../../domain/errors.js';
import { EngineErr } from '../../domain/errors.js';
import type { ProcessOutcome, ProcessRunner } from '../process/run-process.js';
import { assertNever } from '../../../runtime/assert-never.js';

export interface DockerComposeOptions {
  readonly binary?: string;
  readonly projectName: string;
  readonly composeFile: string;
  /** Upper bound for one compose invocation (pulls and image starts included). */
  readonly timeoutMs: number;
}

interface ServiceState {
  readonly state: string;
  readonly health: string;
  readonly image: string;
}

/**
 * Container runtime over `docker compose`.
 *
 * Every call pins the project name and compose file so the engine never acts
 * on whatever stack happens to be in the working directory.
 */
export class DockerComposeRuntime implements ContainerRuntimePort {
  private readonly binary: string;

  constructor(
    private readonly options: DockerComposeOptions,
    private readonly run: ProcessRunner
  ) {
    this.binary = options.binary ?? 'docker';
  }

  down(): ResultAsync<void, EngineError> {
    return this.compose(['down']).andThen((out) => this.requireSuccess('down', out));
  }

  up(services: readonly string[] = []): ResultAsync<void, EngineError> {
    return this.compose(['up', '-d', ...services]).andThen((out) => this.requireSuccess('up', out));
  }

  exec(service: string, argv: readonly string[], io: ExecIo = {}): ResultAsync<ExecOutcome, EngineError> {
    return this.compose(['exec', '-T', service, ...argv], io);
  }

  isHealthy(service: string): ResultAsync<boolean, EngineError> {
    return this.serviceState(service).map(
      (s) => s !== null && s.state === 'running' && (s.health === '' || s.health === 'healthy')
    );
  }

  imageTag(service: string): ResultAsync<string | null, EngineError> {
    return this.serviceState(service).map((s) => (s === null ? null : tagOfImage(s.image)));
  }

  private serviceState(service: string): ResultAsync<ServiceState | null, EngineError> {
    return this.compose(['ps', '--format', 'json', service]).andThen(
      (out): ResultAsync<ServiceState | null, EngineError> => {
        if (out.exitCode !== 0) return this.requireSuccess('ps', out).map(() => null);
        const states = parsePsOutput(out.stdout);
        if (states === null) {
          return errAsync(
            EngineErr.unreachable('RUNTIME_COMMAND_FAILED', 'docker', 'Unrecognised `docker compose ps` output')
          );
        }
        return okAsync(states[0] ?? null);
      }
    );
  }

  private compose(args: readonly string[], io: ExecIo = {}): ResultAsync<ProcessOutcome, EngineError> {
    const full = ['compose', '--project-name', this.options.projectName, '-f', this.options.composeFile, ...args];
    return this.run(this.binary, full, {
      timeoutMs: this.options.timeoutMs,
      stdinFile: io.stdinFile,
      stdoutFile: io.stdoutFile,
    }).mapErr((e): EngineError => {
      switch (e.code) {
        case 'PROCESS_SPAWN_FAILED':
          return EngineErr.unreachable('RUNTIME_UNAVAILABLE', 'docker', `Container runtime unavailable: ${e.message}`);
        case 'PROCESS_TIMED_OUT':
          return EngineErr.unreachable('RUNTIME_COMMAND_FAILED', 'docker', e.message);
        case 'PROCESS_IO_FAILED':
          return EngineErr.localIo('LOCAL_IO_ERROR', e.message);
        default:
          return assertNever(e);
      }
    });
  }

  private requireSuccess(verb: string, out: ProcessOutcome): ResultAsync<void, EngineError> {
    if (out.exitCode === 0) return okAsync(undefined);
    return errAsync(
      EngineErr.unreachable(
        'RUNTIME_COMMAND_FAILED',
        'docker',
        `docker compose ${verb} exited ${out.exitCode}: ${out.stderr || '(no output)'}`
      )
    );
  }
}

/**
 * `docker compose ps --format json` prints a JSON array on older releases and
 * one object per line on newer ones.
 */
export function parsePsOutput(stdout: string): ServiceState[] | null {
  const trimmed = stdout.trim();
  if (trimmed.length === 0) return [];

  const rows: unknown[] = [];
  try {
    if (trimmed.startsWith('[')) {
      const parsed: unknown = JSON.parse(trimmed);
      if (!Array.isArray(parsed)) return null;
      rows.push(...parsed);
    } else {
      for (const line of trimmed.split('\n')) {
        if (line.trim().length > 0) rows.push(JSON.parse(line));
      }
    }
  } catch {
    return null;
  }

  const states: ServiceState[] = [];
  for (const row of rows) {
    if (typeof row !== 'object' || row === null) return null;
    const state = Reflect.get(row, 'State');
    const health = Reflect.get(row, 'Health');
    const image = Reflect.get(row, 'Image');
    states.push({
      state: typeof state === 'string' ? state : '',
      health: typeof health === 'string' ? health : '',
      image: typeof image === 'string' ? image : '',
    });
  }
  return states;
}

/** `registry:5000/org/app:2.7.1` -> `2.7.1`; untagged images are `latest`. */
export function tagOfImage(image: string): string {
  const lastSlash = image.lastIndexOf('/');
  const colon = image.indexOf(':', lastSlash + 1);
  const withoutDigest = image.split('@')[0] ?? image;
  if (colon < 0 || colon >= withoutDigest.length) return 'latest';
  return withoutDigest.slice(colon + 1);
}
