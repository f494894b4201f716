// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';
export { createEngineOperations, domainDirs, type EngineOperations } from './di/engine-operations.js';

// Configuration
export { loadConfig, createValidatedConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';
export { readEnvSources } from './config/env-source.js';

// Engine use cases
export { createSnapshot, type CreateSnapshotReport } from './engine/usecases/create-snapshot.js';
export { pruneSnapshots, type PruneReport } from './engine/usecases/prune-snapshots.js';
export { listSnapshots, showSnapshot, verifySnapshot } from './engine/usecases/inspect-snapshots.js';
export { restoreSnapshot } from './engine/usecases/restore-snapshot.js';
export { RestoreApplier, type RestoreReport } from './engine/usecases/restore-applier.js';
export { RemoteSnapshotClient } from './engine/usecases/remote-snapshot-client.js';

// Domain
export type { EngineError, EngineErrorKind } from './engine/domain/errors.js';
export type { SnapshotId, Namespace } from './engine/domain/ids.js';
export type { SnapshotKind, CaptureRequest } from './engine/domain/snapshot-kind.js';
export type { SnapshotManifest } from './engine/domain/manifest.js';
export type { RetentionPolicy } from './engine/domain/retention.js';
export type { RestoreFailure, RestorePhase } from './engine/domain/restore-state.js';

// Startup errors
export type { AppError, ConfigIssue } from './errors/index.js';
export { formatAppError } from './errors/index.js';

// CLI results, for embedding the commands
export type { CliResult, ExitCode } from './cli/types/index.js';
export { toProcessExitCode } from './cli/types/index.js';
