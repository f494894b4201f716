import * as path from 'node:path';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, okAsync, errAsync } from 'neverthrow';
import type { ArtifactArchiverPort } from '../ports/archiver.port.js';
import type { FileSystemPort, FsError } from '../ports/fs.port.js';
import type { PassphraseSource, SecretSealerPort } from '../ports/secret-sealer.port.js';
import type { SnapshotId } from '../domain/ids.js';
import type { EngineError } from '../domain/errors.js';
import { EngineErr, describeUnknown } from '../domain/errors.js';
import { artifactFileName } from '../domain/manifest.js';
import type { ConfigBundleSource } from '../archive/config-bundle.js';
import { writeConfigBundle } from '../archive/config-bundle.js';
import type { StagedArtifact } from './manifest-builder.js';
import type { Logger } from '../../core/logging/index.js';
import { assertNever } from '../../runtime/assert-never.js';

export type ConfigBackupMode = 'none' | 'plain' | 'sealed';

export interface ConfigFiles {
  readonly envFile: string;
  /** `null` when the compose file is not part of the backup. */
  readonly composeFile: string | null;
}

export interface CaptureConfigArgs {
  readonly snapshotId: SnapshotId;
  readonly stagingDir: string;
  /** Holds the plain bundle while it is sealed; never uploaded. */
  readonly scratchDir: string;
}

export interface RestoreConfigArgs {
  /** Downloaded `config` or `config.enc`. */
  readonly file: string;
  readonly sealed: boolean;
  readonly scratchDir: string;
}

const localIo = (e: FsError): EngineError => EngineErr.localIo('LOCAL_IO_ERROR', e.message);

/**
 * Captures and restores the instance configuration (env file, optionally the
 * compose file) as the `config` artifact, sealed when the mode asks for it.
 *
 * `sealed` never falls back to `plain`: without a usable passphrase the
 * capture fails.
 */
export class ConfigBundler {
  constructor(
    private readonly archiver: ArtifactArchiverPort,
    private readonly sealer: SecretSealerPort,
    private readonly fs: FileSystemPort,
    private readonly logger: Logger,
    private readonly mode: ConfigBackupMode,
    private readonly files: ConfigFiles,
    private readonly passphrase: PassphraseSource | null
  ) {}

  get sealed(): boolean {
    return this.mode === 'sealed';
  }

  /** `null` when nothing was captured. */
  capture(args: CaptureConfigArgs): ResultAsync<StagedArtifact | null, EngineError> {
    switch (this.mode) {
      case 'none':
        return okAsync(null);
      case 'plain':
        return this.writeBundle(path.join(args.stagingDir, artifactFileName('config', false)), args.snapshotId).map(
          (written): StagedArtifact | null => (written ? { domain: 'config', file: artifactFileName('config', false) } : null)
        );
      case 'sealed':
        return this.captureSealed(args);
      default:
        return assertNever(this.mode);
    }
  }

  /** Unseal when needed, then copy the bundled files back to their configured paths. */
  restore(args: RestoreConfigArgs): ResultAsync<readonly string[], EngineError> {
    const plainFile = path.join(args.scratchDir, 'config.bundle');
    const extractDir = path.join(args.scratchDir, 'config');

    const plain: ResultAsync<string, EngineError> = args.sealed
      ? this.requirePassphrase().andThen((passphrase) =>
          this.fs
            .readFileBytes(args.file)
            .mapErr(localIo)
            .andThen((bytes) => this.sealer.unseal(bytes, passphrase))
            .andThen((bytes) => this.fs.writeFileBytes(plainFile, bytes).mapErr(localIo))
            .map(() => plainFile)
        )
      : okAsync(args.file);

    return this.fs
      .mkdirp(args.scratchDir)
      .mapErr(localIo)
      .andThen(() => plain)
      .andThen((file) => this.archiver.extract(file, extractDir))
      .andThen(() => this.fs.readdir(extractDir).mapErr(localIo))
      .andThen((names) => {
        const targets: { readonly from: string; readonly to: string }[] = [];
        if (names.includes('env')) targets.push({ from: path.join(extractDir, 'env'), to: this.files.envFile });
        if (names.includes('compose') && this.files.composeFile !== null) {
          targets.push({ from: path.join(extractDir, 'compose'), to: this.files.composeFile });
        }
        return targets
          .reduce<ResultAsync<void, EngineError>>(
            (acc, t) =>
              acc.andThen(() =>
                this.fs
                  .mkdirp(path.dirname(t.to))
                  .andThen(() => this.fs.copyFile(t.from, t.to))
                  .mapErr(localIo)
              ),
            okAsync(undefined)
          )
          .map(() => targets.map((t) => t.to));
      });
  }

  private captureSealed(args: CaptureConfigArgs): ResultAsync<StagedArtifact | null, EngineError> {
    const plainFile = path.join(args.scratchDir, 'config.bundle');
    const sealedName = artifactFileName('config', true);

    return this.requirePassphrase().andThen((passphrase) =>
      this.fs
        .mkdirp(args.scratchDir)
        .mapErr(localIo)
        .andThen(() => this.writeBundle(plainFile, args.snapshotId))
        .andThen((written): ResultAsync<StagedArtifact | null, EngineError> => {
          if (!written) return okAsync(null);
          return this.fs
            .readFileBytes(plainFile)
            .mapErr(localIo)
            .andThen((bytes) => this.sealer.seal(bytes, passphrase))
            .andThen((sealed) => this.fs.writeFileBytes(path.join(args.stagingDir, sealedName), sealed).mapErr(localIo))
            .andThen(() => this.fs.unlink(plainFile).mapErr(localIo))
            .map((): StagedArtifact => ({ domain: 'config', file: sealedName }));
        })
    );
  }

  private writeBundle(outFile: string, snapshotId: SnapshotId): ResultAsync<boolean, EngineError> {
    const sources: ConfigBundleSource[] = [{ entry: 'env', path: this.files.envFile }];
    if (this.files.composeFile !== null) sources.push({ entry: 'compose', path: this.files.composeFile });

    return RA.fromPromise(writeConfigBundle(outFile, snapshotId, sources), (e) =>
      EngineErr.localIo('LOCAL_IO_ERROR', `Cannot bundle configuration: ${describeUnknown(e)}`)
    ).map((result) => {
      for (const m of result.missing) this.logger.warn({ entry: m.entry, path: m.path }, 'configuration file missing, not backed up');
      return result.included.length > 0;
    });
  }

  private requirePassphrase(): ResultAsync<PassphraseSource, EngineError> {
    return this.passphrase === null
      ? errAsync(EngineErr.localIo('PASSPHRASE_UNAVAILABLE', 'Sealed configuration needs a passphrase file'))
      : okAsync(this.passphrase);
  }
}
