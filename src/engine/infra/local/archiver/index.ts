import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type {
  ArchiveOutcome,
  ArchiveRequest,
  ArchiveSummary,
  ArtifactArchiverPort,
  ExtractOutcome,
} from '../../../ports/archiver.port.js';
import type { EngineError } from '../../../domain/errors.js';
import { EngineErr, describeUnknown } from '../../../domain/errors.js';
import { asSha256Digest } from '../../../domain/ids.js';
import type { ArchiveHeader, ArchiveMode, EntryRecord } from '../../../archive/archive-format.js';
import { ArchiveFormatError, SourceChangedError } from '../../../archive/archive-format.js';
import type { EncodedEntry } from '../../../archive/archive-codec.js';
import { readArchiveFile, writeArchiveFile } from '../../../archive/archive-codec.js';
import type { ChangeToken, TokenEntry } from '../../../archive/change-token.js';
import { CHANGE_TOKEN_VERSION, diffAgainstToken } from '../../../archive/change-token.js';
import type { TreeEntry } from '../../../archive/tree-scanner.js';
import { computeTreeDigest, scanTree } from '../../../archive/tree-scanner.js';
import { nodeErrorCode } from '../../../../runtime/node-error-code.js';
import { assertNever } from '../../../../runtime/assert-never.js';
import type { Logger } from '../../../../core/logging/index.js';

function toEngineError(e: unknown, context: string): EngineError {
  if (e instanceof ArchiveFormatError) return EngineErr.corruption(e.code, `${context}: ${e.message}`);
  if (e instanceof SourceChangedError) {
    return EngineErr.localIo('SOURCE_CHANGED_DURING_ARCHIVE', `${context}: ${e.message}`);
  }
  if (nodeErrorCode(e) === 'ENOENT') {
    return EngineErr.localIo('SOURCE_CHANGED_DURING_ARCHIVE', `${context}: an entry vanished (${describeUnknown(e)})`);
  }
  return EngineErr.localIo('LOCAL_IO_ERROR', `${context}: ${describeUnknown(e)}`);
}

async function isDirectory(p: string): Promise<boolean | null> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch (e) {
    if (nodeErrorCode(e) === 'ENOENT') return null;
    throw e;
  }
}

function toRecord(entry: TreeEntry): EntryRecord {
  switch (entry.type) {
    case 'dir':
      return { t: 'dir', p: entry.path, mode: entry.mode, mtimeMs: entry.mtimeMs };
    case 'file':
      return { t: 'file', p: entry.path, size: entry.size, mode: entry.mode, mtimeMs: entry.mtimeMs };
    case 'symlink':
      return { t: 'symlink', p: entry.path, target: entry.target ?? '', mtimeMs: entry.mtimeMs };
    default:
      return assertNever(entry.type);
  }
}

/**
 * Local tree archiver.
 *
 * - full: every entry of the domain tree
 * - incremental: entries changed since the baseline token, plus `delete` records
 *   for entries that are gone (emitted before any write)
 *
 * File content is hashed while it streams into the archive, so the new token and
 * the tree digest cost no second read of changed files.
 */
export class LocalTreeArchiver implements ArtifactArchiverPort {
  constructor(private readonly logger: Logger) {}

  archive(request: ArchiveRequest): ResultAsync<ArchiveOutcome, EngineError> {
    return RA.fromPromise(this.archiveAsync(request), (e) => toEngineError(e, `Archiving ${request.domain}`));
  }

  inspect(file: string): ResultAsync<ArchiveSummary, EngineError> {
    const run = async (): Promise<ArchiveSummary> => {
      let header: ArchiveHeader | null = null;
      let entryCount = 0;
      let bytes = 0;
      for await (const event of readArchiveFile(file)) {
        if (event.kind === 'header') header = event.header;
        else if (event.kind === 'data') bytes += event.chunk.length;
        else if (event.kind === 'end') entryCount = event.entries;
      }
      if (header === null) throw new ArchiveFormatError('ARCHIVE_INVALID', 'Archive has no header');
      return { header, entryCount, bytes };
    };
    return RA.fromPromise(run(), (e) => toEngineError(e, `Inspecting ${path.basename(file)}`));
  }

  extract(file: string, targetDir: string): ResultAsync<ExtractOutcome, EngineError> {
    return RA.fromPromise(this.extractAsync(file, targetDir), (e) =>
      toEngineError(e, `Extracting ${path.basename(file)} into ${targetDir}`)
    );
  }

  private async archiveAsync(request: ArchiveRequest): Promise<ArchiveOutcome> {
    const { domain, sourceDir, snapshotId } = request;
    const isDir = await isDirectory(sourceDir);
    if (isDir === null) return { kind: 'source_missing', sourceDir };
    if (!isDir) throw new Error(`${sourceDir} is not a directory`);

    const mode: ArchiveMode = request.mode === 'incremental' && request.baseline !== null ? 'incremental' : 'full';
    const baseline = mode === 'incremental' ? request.baseline : null;

    const scan = await scanTree(sourceDir);
    if (scan.unsupported.length > 0) {
      this.logger.warn({ domain, unsupported: scan.unsupported.slice(0, 20) }, 'Skipping special files');
    }

    const diff = diffAgainstToken(baseline, scan.entries);
    const changedPaths = new Set(diff.changed.map((e) => e.path));

    // Unchanged files keep their digest from the baseline; changed ones are
    // filled in as they stream.
    const previousEntries = new Map<string, TokenEntry>(baseline?.entries ?? []);
    const tokenEntries = new Map<string, TokenEntry>();
    for (const entry of scan.entries) {
      const previous = previousEntries.get(entry.path);
      tokenEntries.set(entry.path, {
        type: entry.type,
        size: entry.size,
        mode: entry.mode,
        mtimeMs: entry.mtimeMs,
        sha256: entry.type === 'file' && !changedPaths.has(entry.path) ? previous?.sha256 : undefined,
        target: entry.target,
      });
    }

    const header: ArchiveHeader = {
      t: 'archive',
      v: 1,
      domain,
      mode,
      snapshotId,
      baselineId: baseline?.snapshotId ?? null,
    };

    const entries = async function* (): AsyncGenerator<EncodedEntry> {
      for (const p of diff.deleted) yield { record: { t: 'delete', p } };
      for (const entry of diff.changed) {
        const record = toRecord(entry);
        if (entry.type !== 'file') {
          yield { record };
          continue;
        }
        const hash = createHash('sha256');
        const content = async function* (): AsyncGenerator<Buffer> {
          if (entry.size > 0) {
            const stream = createReadStream(path.join(sourceDir, entry.path), { start: 0, end: entry.size - 1 });
            for await (const raw of stream) {
              const chunk: unknown = raw;
              if (!Buffer.isBuffer(chunk)) continue;
              hash.update(chunk);
              yield chunk;
            }
          }
          const existing = tokenEntries.get(entry.path);
          if (existing) tokenEntries.set(entry.path, { ...existing, sha256: asSha256Digest(`sha256:${hash.digest('hex')}`) });
        };
        yield { record, content: content() };
      }
    };

    await writeArchiveFile(request.outFile, header, entries());

    const missingDigest = [...tokenEntries].find(([, e]) => e.type === 'file' && e.sha256 === undefined);
    if (missingDigest) {
      // Baseline token without a digest for an unchanged file; cannot happen for tokens this archiver wrote.
      throw new ArchiveFormatError('ARCHIVE_INVALID', `Baseline token lacks a digest for ${missingDigest[0]}`);
    }

    const treeSha256 = computeTreeDigest(
      [...tokenEntries].map(([p, e]) => ({ path: p, type: e.type, sha256: e.sha256, target: e.target }))
    );

    const token: ChangeToken = {
      v: CHANGE_TOKEN_VERSION,
      domain,
      snapshotId,
      treeSha256,
      entries: [...tokenEntries],
    };

    this.logger.debug(
      { domain, mode, changed: diff.changed.length, deleted: diff.deleted.length },
      'Domain archived'
    );

    return {
      kind: 'archived',
      mode,
      token,
      treeSha256,
      entryCount: diff.changed.length + diff.deleted.length,
      deletedCount: diff.deleted.length,
      unsupported: scan.unsupported,
    };
  }

  private async extractAsync(file: string, targetDir: string): Promise<ExtractOutcome> {
    await fs.mkdir(targetDir, { recursive: true });
    const root = await fs.realpath(targetDir);
    const dirModes: { dest: string; mode: number }[] = [];
    let open: { handle: fs.FileHandle; dest: string; mode: number; mtimeMs: number } | null = null;
    let written = 0;
    let deleted = 0;

    const closeOpen = async (): Promise<void> => {
      if (open === null) return;
      const current = open;
      open = null;
      await current.handle.close();
      await fs.chmod(current.dest, current.mode);
      const mtime = new Date(current.mtimeMs);
      await fs.utimes(current.dest, mtime, mtime);
    };

    try {
      for await (const event of readArchiveFile(file)) {
        switch (event.kind) {
          case 'header':
            if (event.header.mode === 'full') await clearDirectory(root);
            break;

          case 'data':
            if (open === null) throw new ArchiveFormatError('ARCHIVE_INVALID', 'File data without a file record');
            await open.handle.write(event.chunk);
            break;

          case 'end':
            await closeOpen();
            break;

          case 'record': {
            await closeOpen();
            const record = event.record;
            const dest = await resolveInside(root, record.p);
            switch (record.t) {
              case 'delete':
                await fs.rm(dest, { recursive: true, force: true });
                deleted += 1;
                break;
              case 'dir':
                await replaceUnlessType(dest, 'dir');
                await fs.mkdir(dest, { recursive: true });
                dirModes.push({ dest, mode: record.mode });
                written += 1;
                break;
              case 'file':
                await replaceUnlessType(dest, 'file');
                await fs.mkdir(path.dirname(dest), { recursive: true });
                open = { handle: await fs.open(dest, 'w', 0o600), dest, mode: record.mode, mtimeMs: record.mtimeMs };
                written += 1;
                break;
              case 'symlink':
                await fs.rm(dest, { recursive: true, force: true });
                await fs.mkdir(path.dirname(dest), { recursive: true });
                await fs.symlink(record.target, dest);
                written += 1;
                break;
            }
            break;
          }
        }
      }
    } finally {
      if (open !== null) {
        const dangling: { handle: fs.FileHandle } = open;
        await dangling.handle.close();
      }
    }

    // Directory modes last, deepest first, so read-only directories can still be filled.
    for (const { dest, mode } of dirModes.reverse()) await fs.chmod(dest, mode);
    return { written, deleted };
  }
}

async function clearDirectory(dir: string): Promise<void> {
  for (const name of await fs.readdir(dir)) {
    await fs.rm(path.join(dir, name), { recursive: true, force: true });
  }
}

/**
 * Remove whatever sits at `dest` unless it already has the wanted type.
 * An existing directory stays when a directory is wanted; a file is truncated
 * by the writer anyway.
 */
async function replaceUnlessType(dest: string, wanted: 'dir' | 'file'): Promise<void> {
  let st: Stats;
  try {
    st = await fs.lstat(dest);
  } catch (e) {
    if (nodeErrorCode(e) === 'ENOENT') return;
    throw e;
  }
  const matches = wanted === 'dir' ? st.isDirectory() : st.isFile();
  if (!matches) await fs.rm(dest, { recursive: true, force: true });
}

/**
 * Resolve an entry path under `root` and refuse anything that would land
 * outside it, including through a symlink created by an earlier entry.
 */
async function resolveInside(root: string, entryPath: string): Promise<string> {
  const dest = path.resolve(root, entryPath);
  if (!dest.startsWith(`${root}${path.sep}`)) {
    throw new ArchiveFormatError('ARCHIVE_PATH_UNSAFE', `Entry escapes target: ${entryPath}`);
  }

  let probe = path.dirname(dest);
  for (;;) {
    try {
      const real = await fs.realpath(probe);
      if (real !== root && !real.startsWith(`${root}${path.sep}`)) {
        throw new ArchiveFormatError('ARCHIVE_PATH_UNSAFE', `Entry escapes target through a link: ${entryPath}`);
      }
      return dest;
    } catch (e) {
      if (nodeErrorCode(e) !== 'ENOENT') throw e;
      probe = path.dirname(probe);
    }
  }
}
