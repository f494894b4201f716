/**
 * CLI Commands - Public API
 */

export { executeSnapshotCreateCommand, type SnapshotCreateDeps } from './snapshot-create.js';
export { executeSnapshotListCommand, formatSummary, type SnapshotListDeps } from './snapshot-list.js';
export { executeSnapshotShowCommand, describeManifest, type SnapshotShowDeps } from './snapshot-show.js';
export { executeSnapshotVerifyCommand, type SnapshotVerifyDeps } from './snapshot-verify.js';
export { executeSnapshotPruneCommand, type SnapshotPruneDeps, type SnapshotPruneOptions } from './snapshot-prune.js';
export { executeRestoreCommand, type RestoreDeps, type RestoreOptions } from './restore.js';
