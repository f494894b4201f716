import { createReadStream } from 'node:fs';
import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import type { SnapshotId } from '../domain/ids.js';
import type { EncodedEntry } from './archive-codec.js';
import { writeArchiveFile } from './archive-codec.js';
import { ARCHIVE_FORMAT_VERSION } from './archive-format.js';
import { nodeErrorCode } from '../../runtime/node-error-code.js';

/** Entry names inside a config bundle. */
export type ConfigBundleEntry = 'env' | 'compose';

export interface ConfigBundleSource {
  readonly entry: ConfigBundleEntry;
  readonly path: string;
}

export interface ConfigBundleResult {
  readonly included: readonly ConfigBundleEntry[];
  /** Sources that did not exist and were left out. */
  readonly missing: readonly ConfigBundleSource[];
}

/**
 * Write the configuration files as a one-level `config` archive. Missing
 * sources are reported, not fatal. Nothing is written when every source is
 * missing.
 */
export async function writeConfigBundle(
  outFile: string,
  snapshotId: SnapshotId,
  sources: readonly ConfigBundleSource[]
): Promise<ConfigBundleResult> {
  const entries: EncodedEntry[] = [];
  const included: ConfigBundleEntry[] = [];
  const missing: ConfigBundleSource[] = [];

  for (const source of sources) {
    let st: Stats;
    try {
      st = await fs.stat(source.path);
    } catch (e) {
      if (nodeErrorCode(e) !== 'ENOENT') throw e;
      missing.push(source);
      continue;
    }
    included.push(source.entry);
    entries.push({
      record: {
        t: 'file',
        p: source.entry,
        size: st.size,
        mode: st.mode & 0o7777,
        mtimeMs: Math.floor(st.mtimeMs),
      },
      content: readExactly(source.path, st.size),
    });
  }

  if (entries.length > 0) {
    await writeArchiveFile(
      outFile,
      { t: 'archive', v: ARCHIVE_FORMAT_VERSION, domain: 'config', mode: 'full', snapshotId, baselineId: null },
      entries
    );
  }
  return { included, missing };
}

async function* readExactly(file: string, size: number): AsyncGenerator<Buffer> {
  if (size === 0) return;
  for await (const raw of createReadStream(file, { start: 0, end: size - 1 })) {
    const chunk: unknown = raw;
    if (Buffer.isBuffer(chunk)) yield chunk;
  }
}
