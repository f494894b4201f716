import type { ResultAsync } from 'neverthrow';
import { okAsync, errAsync } from 'neverthrow';
import type { StateDirPort } from '../../../ports/state-dir.port.js';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';
import type { ChangeTokenStorePort } from '../../../ports/change-token-store.port.js';
import type { Namespace } from '../../../domain/ids.js';
import type { TreeDomain } from '../../../domain/snapshot-kind.js';
import type { EngineError } from '../../../domain/errors.js';
import { EngineErr } from '../../../domain/errors.js';
import type { ChangeToken } from '../../../archive/change-token.js';
import { ChangeTokenSchema } from '../../../archive/change-token.js';
import type { Logger } from '../../../../core/logging/index.js';

const toEngine = (e: FsError): EngineError => EngineErr.localIo('LOCAL_IO_ERROR', e.message);

export class LocalChangeTokenStore implements ChangeTokenStorePort {
  constructor(
    private readonly stateDir: StateDirPort,
    private readonly fs: FileSystemPort,
    private readonly logger: Logger
  ) {}

  load(ns: Namespace, domain: TreeDomain): ResultAsync<ChangeToken | null, EngineError> {
    const filePath = this.stateDir.tokenPath(ns, domain);
    return this.fs
      .readFileUtf8(filePath)
      .map((raw): ChangeToken | null => {
        let parsed: unknown;
        try {
          parsed = JSON.parse(raw);
        } catch {
          this.logger.warn({ domain, filePath }, 'Change token is not valid JSON; ignoring it');
          return null;
        }
        const validated = ChangeTokenSchema.safeParse(parsed);
        if (!validated.success || validated.data.domain !== domain) {
          this.logger.warn({ domain, filePath }, 'Change token is malformed; ignoring it');
          return null;
        }
        return validated.data;
      })
      .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(null) : errAsync(toEngine(e))));
  }

  save(ns: Namespace, token: ChangeToken): ResultAsync<void, EngineError> {
    const dir = this.stateDir.tokensDir(ns);
    const filePath = this.stateDir.tokenPath(ns, token.domain);
    const tmpPath = `${filePath}.tmp`;
    const bytes = new TextEncoder().encode(JSON.stringify(token));

    return this.fs
      .mkdirp(dir)
      .andThen(() => this.fs.openWriteTruncate(tmpPath))
      .andThen((h) =>
        this.fs
          .writeAll(h.fd, bytes)
          .andThen(() => this.fs.fsyncFile(h.fd))
          // Close on failure too; the write error is the one reported.
          .orElse((e) => this.fs.closeFile(h.fd).orElse(() => errAsync(e)).andThen(() => errAsync(e)))
          .andThen(() => this.fs.closeFile(h.fd))
      )
      .andThen(() => this.fs.rename(tmpPath, filePath))
      .andThen(() =>
        this.fs.fsyncDir(dir).orElse((e) => (e.code === 'FS_UNSUPPORTED' ? okAsync(undefined) : errAsync(e)))
      )
      .mapErr(toEngine);
  }

  clear(ns: Namespace): ResultAsync<void, EngineError> {
    return this.fs.removeTree(this.stateDir.tokensDir(ns)).mapErr(toEngine);
  }
}
