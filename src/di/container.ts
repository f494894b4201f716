import 'reflect-metadata';
import * as os from 'node:os';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer, InjectionToken } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { Sleep } from '../runtime/sleep.js';
import { realSleep } from '../runtime/sleep.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { readEnvSources } from '../config/env-source.js';
import type { AppError } from '../errors/app-error.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import type { FileSystemPort } from '../engine/ports/fs.port.js';
import type { StateDirPort } from '../engine/ports/state-dir.port.js';
import type { TimeClockPort } from '../engine/ports/time-clock.port.js';
import type { FileHasherPort } from '../engine/ports/file-hasher.port.js';
import type { SecretSealerPort } from '../engine/ports/secret-sealer.port.js';
import type { ObjectStorePort } from '../engine/ports/object-store.port.js';
import type { ContainerRuntimePort } from '../engine/ports/container-runtime.port.js';
import type { DatabaseDumperPort } from '../engine/ports/database-dumper.port.js';
import type { ArtifactArchiverPort } from '../engine/ports/archiver.port.js';
import type { ChangeTokenStorePort } from '../engine/ports/change-token-store.port.js';
import type { SnapshotLockPort } from '../engine/ports/snapshot-lock.port.js';
import type { ProcessRunner } from '../engine/infra/process/run-process.js';
import { runProcess } from '../engine/infra/process/run-process.js';
import { NodeFileSystem } from '../engine/infra/local/fs/index.js';
import { LocalStateDir } from '../engine/infra/local/state-dir/index.js';
import { NodeTimeClock } from '../engine/infra/local/time-clock/index.js';
import { NodeFileHasher } from '../engine/infra/local/file-hasher/index.js';
import { AesGcmSecretSealer } from '../engine/infra/local/secret-sealer/index.js';
import { LocalDirectoryObjectStore } from '../engine/infra/local/object-store/index.js';
import { LocalTreeArchiver } from '../engine/infra/local/archiver/index.js';
import { LocalChangeTokenStore } from '../engine/infra/local/token-store/index.js';
import { LocalSnapshotLock } from '../engine/infra/local/snapshot-lock/index.js';
import { RcloneObjectStore } from '../engine/infra/rclone/index.js';
import { DockerComposeRuntime, ComposePostgresDumper } from '../engine/infra/compose/index.js';
import { RemoteSnapshotClient } from '../engine/usecases/remote-snapshot-client.js';
import { NamespaceGate } from '../engine/usecases/namespace-gate.js';
import { ConfigBundler } from '../engine/usecases/config-bundler.js';
import { RestoreApplier } from '../engine/usecases/restore-applier.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

/**
 * Register unless the token is already there: tests pre-register fakes and
 * the composition root must not overwrite them.
 */
function registerDefault<T>(token: InjectionToken<T>, factory: (c: DependencyContainer) => T): void {
  if (!container.isRegistered(token)) {
    container.register<T>(token, { useFactory: instanceCachingFactory<T>(factory) });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Defaults to `process.env`. */
  readonly env?: Readonly<Record<string, string | undefined>>;
}

function registerConfig(options: ContainerInitOptions): Result<void, AppError> {
  // Allow tests to inject config explicitly before container initialization.
  if (!container.isRegistered(DI.Config.App)) {
    const env = readEnvSources(options.env ?? process.env);
    if (env.isErr()) return err(env.error);

    const configResult = loadConfig({ env: env.value, homeDir: os.homedir(), hostIdentity: os.hostname() });
    if (configResult.isErr()) return err(configResult.error);
    container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  }

  registerDefault<ILoggerFactory>(DI.Logging.Factory, (c) => {
    const config = c.resolve<ValidatedConfig>(DI.Config.App);
    return new PinoLoggerFactory(config.logLevel);
  });
  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'cli' };
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// ENGINE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Dependency levels:
 * - Level 1: Primitives (FS, StateDir, Clock, Sleep, ProcessRunner, Hasher, Sealer) - no deps
 * - Level 2: Adapters (ObjectStore, Runtime, Dumper, Archiver, Tokens, Lock) - depend on Level 1
 * - Level 3: Engine services (RemoteClient, Gate, ConfigBundler, Applier) - depend on Level 2
 */
function registerEngine(): void {
  const config = (c: DependencyContainer): ValidatedConfig => c.resolve<ValidatedConfig>(DI.Config.App);
  const logger = (c: DependencyContainer, component: string) =>
    c.resolve<ILoggerFactory>(DI.Logging.Factory).create(component);

  // Level 1
  registerDefault<FileSystemPort>(DI.Primitives.FileSystem, () => new NodeFileSystem());
  registerDefault<StateDirPort>(DI.Primitives.StateDir, (c) => new LocalStateDir(config(c).paths.stateDir));
  registerDefault<TimeClockPort>(DI.Primitives.TimeClock, () => new NodeTimeClock());
  registerDefault<Sleep>(DI.Primitives.Sleep, () => realSleep);
  registerDefault<ProcessRunner>(DI.Primitives.ProcessRunner, () => runProcess);
  registerDefault<FileHasherPort>(DI.Primitives.FileHasher, () => new NodeFileHasher());
  registerDefault<SecretSealerPort>(
    DI.Primitives.SecretSealer,
    (c) => new AesGcmSecretSealer(c.resolve<FileSystemPort>(DI.Primitives.FileSystem))
  );

  // Level 2
  registerDefault<ObjectStorePort>(DI.Adapters.ObjectStore, (c) => {
    const { remote, remoteCalls } = config(c);
    switch (remote.kind) {
      case 'local':
        return new LocalDirectoryObjectStore(remote.root);
      case 'rclone':
        return new RcloneObjectStore(
          { remoteName: remote.remoteName, remotePath: remote.remotePath, timeoutMs: remoteCalls.timeoutMs },
          c.resolve<ProcessRunner>(DI.Primitives.ProcessRunner)
        );
      default:
        return assertNever(remote);
    }
  });
  registerDefault<ContainerRuntimePort>(DI.Adapters.ContainerRuntime, (c) => {
    const { compose, paths } = config(c);
    return new DockerComposeRuntime(
      { projectName: compose.projectName, composeFile: paths.composeFile, timeoutMs: compose.timeoutMs },
      c.resolve<ProcessRunner>(DI.Primitives.ProcessRunner)
    );
  });
  registerDefault<DatabaseDumperPort>(DI.Adapters.DatabaseDumper, (c) => {
    const { compose, database } = config(c);
    return new ComposePostgresDumper(
      c.resolve<ContainerRuntimePort>(DI.Adapters.ContainerRuntime),
      {
        service: compose.dbService,
        user: database.user,
        database: database.name,
        readyAttempts: database.readyAttempts,
        readyDelayMs: database.readyDelayMs,
      },
      c.resolve<Sleep>(DI.Primitives.Sleep),
      logger(c, 'dumper')
    );
  });
  registerDefault<ArtifactArchiverPort>(DI.Adapters.Archiver, (c) => new LocalTreeArchiver(logger(c, 'archiver')));
  registerDefault<ChangeTokenStorePort>(
    DI.Adapters.ChangeTokens,
    (c) =>
      new LocalChangeTokenStore(
        c.resolve<StateDirPort>(DI.Primitives.StateDir),
        c.resolve<FileSystemPort>(DI.Primitives.FileSystem),
        logger(c, 'tokens')
      )
  );
  registerDefault<SnapshotLockPort>(
    DI.Adapters.SnapshotLock,
    (c) =>
      new LocalSnapshotLock(
        c.resolve<StateDirPort>(DI.Primitives.StateDir),
        c.resolve<FileSystemPort>(DI.Primitives.FileSystem),
        c.resolve<TimeClockPort>(DI.Primitives.TimeClock)
      )
  );

  // Level 3
  registerDefault<RemoteSnapshotClient>(
    DI.Engine.RemoteClient,
    (c) =>
      new RemoteSnapshotClient(
        c.resolve<ObjectStorePort>(DI.Adapters.ObjectStore),
        c.resolve<FileSystemPort>(DI.Primitives.FileSystem),
        c.resolve<FileHasherPort>(DI.Primitives.FileHasher),
        c.resolve<Sleep>(DI.Primitives.Sleep),
        logger(c, 'remote'),
        config(c).remoteCalls
      )
  );
  registerDefault<NamespaceGate>(
    DI.Engine.NamespaceGate,
    (c) => new NamespaceGate(c.resolve<SnapshotLockPort>(DI.Adapters.SnapshotLock), logger(c, 'lock'))
  );
  registerDefault<ConfigBundler>(DI.Engine.ConfigBundler, (c) => {
    const { configBackup, paths } = config(c);
    return new ConfigBundler(
      c.resolve<ArtifactArchiverPort>(DI.Adapters.Archiver),
      c.resolve<SecretSealerPort>(DI.Primitives.SecretSealer),
      c.resolve<FileSystemPort>(DI.Primitives.FileSystem),
      logger(c, 'config-bundle'),
      configBackup.mode,
      { envFile: paths.envFile, composeFile: configBackup.includeCompose ? paths.composeFile : null },
      { kind: 'file', path: configBackup.passphraseFile }
    );
  });
  registerDefault<RestoreApplier>(
    DI.Engine.RestoreApplier,
    (c) =>
      new RestoreApplier({
        runtime: c.resolve<ContainerRuntimePort>(DI.Adapters.ContainerRuntime),
        dumper: c.resolve<DatabaseDumperPort>(DI.Adapters.DatabaseDumper),
        archiver: c.resolve<ArtifactArchiverPort>(DI.Adapters.Archiver),
        remote: c.resolve<RemoteSnapshotClient>(DI.Engine.RemoteClient),
        configBundler: c.resolve<ConfigBundler>(DI.Engine.ConfigBundler),
        fs: c.resolve<FileSystemPort>(DI.Primitives.FileSystem),
        logger: logger(c, 'restore'),
      })
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 * Idempotent: multiple calls after initialization return immediately.
 * Configuration errors are returned, not thrown; the caller decides how to exit.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, AppError> {
  if (initialized) return ok(undefined);

  registerRuntime(options);
  const configured = registerConfig(options);
  if (configured.isErr()) return configured;
  registerEngine();
  initialized = true;
  return ok(undefined);
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
