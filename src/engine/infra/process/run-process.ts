import { spawn } from 'node:child_process';
import { createReadStream, createWriteStream } from 'node:fs';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';

export interface RunProcessOptions {
  readonly timeoutMs: number;
  readonly stdinFile?: string;
  readonly stdoutFile?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
}

export interface ProcessOutcome {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export type ProcessError =
  | { readonly code: 'PROCESS_SPAWN_FAILED'; readonly message: string }
  | { readonly code: 'PROCESS_TIMED_OUT'; readonly message: string }
  | { readonly code: 'PROCESS_IO_FAILED'; readonly message: string };

/** Captured stderr is cut to this many characters (tail kept). */
const STDERR_LIMIT = 8 * 1024;

/**
 * Injectable subprocess runner: adapters for external binaries (docker, rclone)
 * take one of these so tests can script outcomes.
 */
export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options: RunProcessOptions
) => ResultAsync<ProcessOutcome, ProcessError>;

class ProcessFailure extends Error {
  constructor(readonly error: ProcessError) {
    super(error.message);
  }
}

/**
 * Spawn without a shell. A non-zero exit is an outcome, not an error: callers
 * interpret exit codes. The child is killed once `timeoutMs` elapses.
 */
export const runProcess: ProcessRunner = (command, args, options) => {
  const label = `${command} ${args.slice(0, 2).join(' ')}`.trim();

  const run = new Promise<ProcessOutcome>((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let stdinError: string | null = null;
    let exit: { code: number | null; signal: NodeJS.Signals | null } | null = null;
    let stdoutFlushed = options.stdoutFile === undefined;
    let settled = false;
    const settle = (outcome: { ok: ProcessOutcome } | { error: ProcessError }): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if ('ok' in outcome) resolve(outcome.ok);
      else reject(new ProcessFailure(outcome.error));
    };

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      settle({ error: { code: 'PROCESS_TIMED_OUT', message: `${label} timed out after ${options.timeoutMs}ms` } });
    }, options.timeoutMs);

    child.on('error', (e) => settle({ error: { code: 'PROCESS_SPAWN_FAILED', message: `${label}: ${e.message}` } }));

    if (options.stdoutFile !== undefined) {
      const out = createWriteStream(options.stdoutFile);
      out.on('error', (e) => {
        child.kill('SIGKILL');
        settle({ error: { code: 'PROCESS_IO_FAILED', message: `${label}: ${e.message}` } });
      });
      out.on('close', () => {
        stdoutFlushed = true;
        finishIfDone();
      });
      child.stdout.pipe(out);
    } else {
      child.stdout.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
    }

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-STDERR_LIMIT);
    });

    if (options.stdinFile !== undefined) {
      const input = createReadStream(options.stdinFile);
      input.on('error', (e) => {
        child.kill('SIGKILL');
        settle({ error: { code: 'PROCESS_IO_FAILED', message: `${label}: ${e.message}` } });
      });
      // EPIPE when the child exits before reading all input; reported with its exit code.
      child.stdin.on('error', (e) => {
        stdinError = e.message;
      });
      input.pipe(child.stdin);
    } else {
      child.stdin.end();
    }

    const finishIfDone = (): void => {
      if (exit === null || !stdoutFlushed) return;
      const exitCode = exit.code ?? (exit.signal ? 128 : 1);
      const detail = exitCode !== 0 && stdinError !== null ? `${stderr}\nstdin: ${stdinError}` : stderr;
      settle({ ok: { exitCode, stdout, stderr: detail.trim() } });
    };

    child.on('close', (code, signal) => {
      exit = { code, signal };
      finishIfDone();
    });
  });

  return RA.fromPromise(run, (e): ProcessError =>
    e instanceof ProcessFailure ? e.error : { code: 'PROCESS_IO_FAILED', message: `${label}: ${String(e)}` }
  );
};
