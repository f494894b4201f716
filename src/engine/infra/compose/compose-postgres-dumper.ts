import { open } from 'node:fs/promises';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, okAsync, errAsync } from 'neverthrow';
import type { ContainerRuntimePort, ExecOutcome } from '../../ports/container-runtime.port.js';
import type { DatabaseDumperPort } from '../../ports/database-dumper.port.js';
import type { EngineError } from '../../domain/errors.js';
import { EngineErr, describeUnknown } from '../../domain/errors.js';
import type { Sleep } from '../../../runtime/sleep.js';
import type { Logger } from '../../../core/logging/index.js';

export interface ComposePostgresOptions {
  /** Compose service running PostgreSQL. */
  readonly service: string;
  readonly user: string;
  readonly database: string;
  readonly readyAttempts: number;
  readonly readyDelayMs: number;
}

/** pg_dump writes this comment as the last line of a plain-format dump. */
export const DUMP_TRAILER = 'PostgreSQL database dump complete';
const TRAILER_WINDOW_BYTES = 4096;

/**
 * PostgreSQL dump/restore executed inside the database container, so the host
 * needs no client tools of matching version.
 */
export class ComposePostgresDumper implements DatabaseDumperPort {
  constructor(
    private readonly runtime: ContainerRuntimePort,
    private readonly options: ComposePostgresOptions,
    private readonly sleep: Sleep,
    private readonly logger: Logger
  ) {}

  waitReady(): ResultAsync<void, EngineError> {
    const { service, user, database, readyAttempts, readyDelayMs } = this.options;
    const probe = (attempt: number): ResultAsync<void, EngineError> =>
      this.runtime.exec(service, ['pg_isready', '-U', user, '-d', database]).andThen((out): ResultAsync<void, EngineError> => {
        if (out.exitCode === 0) return okAsync(undefined);
        if (attempt >= readyAttempts) {
          return errAsync(
            EngineErr.unreachable(
              'DATABASE_UNREACHABLE',
              service,
              `Database not ready after ${readyAttempts} attempts: ${out.stderr || out.stdout || 'no response'}`
            )
          );
        }
        this.logger.debug({ attempt, service }, 'database not ready yet');
        return RA.fromSafePromise(this.sleep(readyDelayMs)).andThen(() => probe(attempt + 1));
      });
    return probe(1);
  }

  dump(outFile: string): ResultAsync<{ readonly sizeBytes: number }, EngineError> {
    const { service, user, database } = this.options;
    return this.runtime
      .exec(service, ['pg_dump', '-U', user, database], { stdoutFile: outFile })
      .andThen((out) => this.requireExit('pg_dump', out))
      .andThen(() =>
        RA.fromPromise(fileSize(outFile), (e) =>
          EngineErr.localIo('LOCAL_IO_ERROR', `Cannot stat dump ${outFile}: ${describeUnknown(e)}`)
        )
      )
      .andThen((sizeBytes): ResultAsync<{ readonly sizeBytes: number }, EngineError> =>
        sizeBytes > 0
          ? okAsync({ sizeBytes })
          : errAsync(EngineErr.unreachable('RUNTIME_COMMAND_FAILED', service, 'pg_dump produced an empty dump'))
      );
  }

  restore(inFile: string): ResultAsync<void, EngineError> {
    const { service, user, database } = this.options;
    const admin = (sql: string): ResultAsync<void, EngineError> =>
      this.runtime
        .exec(service, ['psql', '-v', 'ON_ERROR_STOP=1', '-U', user, '-d', 'postgres', '-c', sql])
        .andThen((out) => this.requireExit('psql', out));

    return admin(`DROP DATABASE IF EXISTS ${quoteIdent(database)}`)
      .andThen(() => admin(`CREATE DATABASE ${quoteIdent(database)} OWNER ${quoteIdent(user)}`))
      .andThen(() =>
        this.runtime.exec(service, ['psql', '-v', 'ON_ERROR_STOP=1', '-U', user, '-d', database], {
          stdinFile: inFile,
        })
      )
      .andThen((out) => this.requireExit('psql', out))
      .map(() => {
        this.logger.info({ service, database }, 'database restored');
      });
  }

  isCompleteDump(file: string): ResultAsync<boolean, EngineError> {
    return RA.fromPromise(readTail(file, TRAILER_WINDOW_BYTES), (e) =>
      EngineErr.localIo('LOCAL_IO_ERROR', `Cannot read dump ${file}: ${describeUnknown(e)}`)
    ).map((tail) => tail.includes(DUMP_TRAILER));
  }

  private requireExit(command: string, out: ExecOutcome): ResultAsync<void, EngineError> {
    if (out.exitCode === 0) return okAsync(undefined);
    return errAsync(
      EngineErr.unreachable(
        'RUNTIME_COMMAND_FAILED',
        this.options.service,
        `${command} exited ${out.exitCode}: ${out.stderr || '(no output)'}`
      )
    );
  }
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

async function fileSize(file: string): Promise<number> {
  const handle = await open(file, 'r');
  try {
    return (await handle.stat()).size;
  } finally {
    await handle.close();
  }
}

async function readTail(file: string, bytes: number): Promise<string> {
  const handle = await open(file, 'r');
  try {
    const { size } = await handle.stat();
    const length = Math.min(size, bytes);
    const buffer = Buffer.alloc(length);
    await handle.read(buffer, 0, length, size - length);
    return buffer.toString('utf8');
  } finally {
    await handle.close();
  }
}
