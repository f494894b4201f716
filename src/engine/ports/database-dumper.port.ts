import type { ResultAsync } from 'neverthrow';
import type { EngineError } from '../domain/errors.js';

/**
 * Port: logical dump and restore of the application database.
 *
 * Dumps are always complete, whatever the snapshot kind.
 */
export interface DatabaseDumperPort {
  /** Polls until the database accepts connections; `unreachable` when it never does. */
  waitReady(): ResultAsync<void, EngineError>;
  dump(outFile: string): ResultAsync<{ readonly sizeBytes: number }, EngineError>;
  /** Drops and recreates the database, then loads `inFile`. */
  restore(inFile: string): ResultAsync<void, EngineError>;
  /** Whether a dump file is complete (its trailer is present). */
  isCompleteDump(file: string): ResultAsync<boolean, EngineError>;
}
