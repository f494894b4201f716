#!/usr/bin/env node
/**
 * docsnap CLI - Composition Root
 *
 * This is a thin composition root that:
 * 1. Wires dependencies for each command
 * 2. Interprets CliResult into process termination
 * 3. Contains NO business logic
 *
 * All business logic lives in src/cli/commands/*.ts and src/engine.
 */

import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { EngineOperations } from './di/engine-operations.js';
import { createEngineOperations } from './di/engine-operations.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import { formatAppError } from './errors/formatter.js';
import { ENGINE_VERSION } from './engine/engine-version.js';

import type { CliResult } from './cli/types/cli-result.js';
import { failure } from './cli/types/cli-result.js';
import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import {
  executeSnapshotCreateCommand,
  executeSnapshotListCommand,
  executeSnapshotShowCommand,
  executeSnapshotVerifyCommand,
  executeSnapshotPruneCommand,
  executeRestoreCommand,
} from './cli/commands/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the container and run one command against the engine.
 * Configuration errors exit before any command runs.
 */
async function runWithEngine(command: (engine: EngineOperations) => Promise<CliResult>): Promise<void> {
  const initialized = initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (initialized.isErr()) {
    interpretCliResultWithoutDI(failure(formatAppError(initialized.error)));
    return;
  }

  const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
  const result = await command(createEngineOperations(container));
  interpretCliResult(result, terminator);
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('docsnap')
  .description('Incremental, verifiable snapshots of a self-hosted document-management stack')
  .version(ENGINE_VERSION);

// Unknown commands and bad arguments are misuse (exit 2). Set before the
// subcommands are declared so they inherit it.
program.exitOverride((error) => {
  process.exit(error.exitCode === 0 ? 0 : 2);
});

const snapshot = program.command('snapshot').description('Create, inspect and prune snapshots');

snapshot
  .command('create <kind>')
  .description('Create a snapshot: full, incremental or archive')
  .action(async (kind: string) => {
    await runWithEngine((engine) => executeSnapshotCreateCommand(kind, engine));
  });

snapshot
  .command('list')
  .description('List snapshots on the remote, oldest first')
  .action(async () => {
    await runWithEngine((engine) => executeSnapshotListCommand(engine));
  });

snapshot
  .command('show <id>')
  .description('Print the manifest of a snapshot')
  .action(async (id: string) => {
    await runWithEngine((engine) => executeSnapshotShowCommand(id, engine));
  });

snapshot
  .command('verify <id>')
  .description('Download the chain of a snapshot and check every artifact')
  .action(async (id: string) => {
    await runWithEngine((engine) => executeSnapshotVerifyCommand(id, engine));
  });

snapshot
  .command('prune')
  .description('Delete snapshots outside the retention policy')
  .option('-n, --dry-run', 'Report what would be deleted without deleting')
  .action(async (options: { dryRun?: boolean }) => {
    await runWithEngine((engine) => executeSnapshotPruneCommand(engine, { dryRun: options.dryRun }));
  });

program
  .command('restore [id]')
  .description('Restore a snapshot (default: the latest verified one)')
  .option('--restore-config', 'Also restore the env file and compose file')
  .action(async (id: string | undefined, options: { restoreConfig?: boolean }) => {
    await runWithEngine((engine) => executeRestoreCommand(id, engine, { restoreConfig: options.restoreConfig }));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
