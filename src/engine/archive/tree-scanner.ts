import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Sha256Digest } from '../domain/ids.js';
import { asSha256Digest } from '../domain/ids.js';
import { nodeErrorCode } from '../../runtime/node-error-code.js';

export type TreeEntryType = 'dir' | 'file' | 'symlink';

export interface TreeEntry {
  /** Relative to the scanned root, `/`-separated. */
  readonly path: string;
  readonly type: TreeEntryType;
  readonly size: number;
  /** Permission bits only. */
  readonly mode: number;
  /** Whole milliseconds. */
  readonly mtimeMs: number;
  readonly target?: string;
}

export interface TreeScan {
  /** Sorted by path; a directory always precedes its children. */
  readonly entries: readonly TreeEntry[];
  /** Sockets, fifos and devices are not archived. */
  readonly unsupported: readonly string[];
}

export function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export async function scanTree(root: string): Promise<TreeScan> {
  const entries: TreeEntry[] = [];
  const unsupported: string[] = [];
  const pending: string[] = [''];

  while (pending.length > 0) {
    const rel = pending.pop() ?? '';
    const names = await fs.readdir(rel === '' ? root : path.join(root, rel));
    for (const name of names) {
      const childRel = rel === '' ? name : `${rel}/${name}`;
      const abs = path.join(root, childRel);
      const st = await fs.lstat(abs);
      const base = { path: childRel, mode: st.mode & 0o7777, mtimeMs: Math.floor(st.mtimeMs) };

      if (st.isDirectory()) {
        entries.push({ ...base, type: 'dir', size: 0 });
        pending.push(childRel);
      } else if (st.isFile()) {
        entries.push({ ...base, type: 'file', size: st.size });
      } else if (st.isSymbolicLink()) {
        entries.push({ ...base, type: 'symlink', size: 0, target: await fs.readlink(abs) });
      } else {
        unsupported.push(childRel);
      }
    }
  }

  entries.sort((a, b) => comparePaths(a.path, b.path));
  unsupported.sort(comparePaths);
  return { entries, unsupported };
}

export async function hashFileStream(filePath: string): Promise<{ sha256: Sha256Digest; sizeBytes: number }> {
  const hash = createHash('sha256');
  let sizeBytes = 0;
  for await (const raw of createReadStream(filePath)) {
    const chunk: unknown = raw;
    if (!Buffer.isBuffer(chunk)) continue;
    hash.update(chunk);
    sizeBytes += chunk.length;
  }
  return { sha256: asSha256Digest(`sha256:${hash.digest('hex')}`), sizeBytes };
}

export interface DigestLine {
  readonly path: string;
  readonly type: TreeEntryType;
  /** Files: content digest. */
  readonly sha256?: string;
  /** Symlinks: link target. */
  readonly target?: string;
}

/**
 * Recursive tree digest: sha256 over `path \0 type \0 (sha256 | target) \n`
 * for every entry in path order. Modes and mtimes are not part of it, so a
 * restored tree hashes the same as its source.
 */
export function computeTreeDigest(lines: Iterable<DigestLine>): Sha256Digest {
  const sorted = [...lines].sort((a, b) => comparePaths(a.path, b.path));
  const hash = createHash('sha256');
  for (const l of sorted) {
    const value = l.type === 'file' ? (l.sha256 ?? '') : l.type === 'symlink' ? (l.target ?? '') : '';
    hash.update(`${l.path}\0${l.type}\0${value}\n`, 'utf8');
  }
  return asSha256Digest(`sha256:${hash.digest('hex')}`);
}

/**
 * Digest of a directory as it is on disk. A missing directory digests as empty.
 */
export async function digestDirectory(root: string): Promise<Sha256Digest> {
  let scan: TreeScan;
  try {
    scan = await scanTree(root);
  } catch (e) {
    if (nodeErrorCode(e) === 'ENOENT') return computeTreeDigest([]);
    throw e;
  }

  const lines: DigestLine[] = [];
  for (const entry of scan.entries) {
    if (entry.type === 'file') {
      const { sha256 } = await hashFileStream(path.join(root, entry.path));
      lines.push({ path: entry.path, type: 'file', sha256 });
    } else {
      lines.push({ path: entry.path, type: entry.type, target: entry.target });
    }
  }
  return computeTreeDigest(lines);
}
