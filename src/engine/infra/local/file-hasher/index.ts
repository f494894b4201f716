import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { FileDigest, FileHasherPort } from '../../../ports/file-hasher.port.js';
import type { EngineError } from '../../../domain/errors.js';
import { EngineErr, describeUnknown } from '../../../domain/errors.js';
import { hashFileStream } from '../../../archive/tree-scanner.js';

export class NodeFileHasher implements FileHasherPort {
  hashFile(filePath: string): ResultAsync<FileDigest, EngineError> {
    return RA.fromPromise(hashFileStream(filePath), (e) =>
      EngineErr.localIo('LOCAL_IO_ERROR', `Cannot hash ${filePath}: ${describeUnknown(e)}`)
    );
  }
}
