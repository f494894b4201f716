import { z } from 'zod';
import { Sha256Schema, SnapshotIdSchema } from '../domain/manifest.js';
import type { TreeEntry } from './tree-scanner.js';
import { assertNever } from '../../runtime/assert-never.js';

export const CHANGE_TOKEN_VERSION = 1;

const TokenEntrySchema = z.object({
  type: z.enum(['dir', 'file', 'symlink']),
  size: z.number().int().nonnegative(),
  mode: z.number().int(),
  mtimeMs: z.number().int(),
  sha256: Sha256Schema.optional(),
  target: z.string().optional(),
});

/**
 * Change-state token of one tree domain: the metadata of every entry as it was
 * archived for `snapshotId`. Owned by the archiver; persisted by the driver
 * only once that snapshot is verified remotely.
 */
export const ChangeTokenSchema = z.object({
  v: z.literal(CHANGE_TOKEN_VERSION),
  domain: z.enum(['media', 'data', 'export']),
  snapshotId: SnapshotIdSchema,
  treeSha256: Sha256Schema,
  /** `[path, entry]` pairs in scan order. Paths are arbitrary file names, so never object keys. */
  entries: z.array(z.tuple([z.string(), TokenEntrySchema])),
});

export type ChangeToken = z.infer<typeof ChangeTokenSchema>;
export type TokenEntry = z.infer<typeof TokenEntrySchema>;

/**
 * An entry is changed when its type, size, mode or whole-ms mtime differs (or a
 * symlink target moved). Directories only compare type and mode: their mtime
 * moves with every child.
 */
export function isEntryChanged(previous: TokenEntry | undefined, current: TreeEntry): boolean {
  if (previous === undefined || previous.type !== current.type) return true;
  switch (current.type) {
    case 'dir':
      return previous.mode !== current.mode;
    case 'symlink':
      return previous.target !== current.target || previous.mtimeMs !== current.mtimeMs;
    case 'file':
      return previous.size !== current.size || previous.mode !== current.mode || previous.mtimeMs !== current.mtimeMs;
    default:
      return assertNever(current.type);
  }
}

export interface TreeDiff {
  readonly changed: readonly TreeEntry[];
  /** Paths present in the baseline and gone now, sorted. */
  readonly deleted: readonly string[];
}

export function diffAgainstToken(baseline: ChangeToken | null, current: readonly TreeEntry[]): TreeDiff {
  if (baseline === null) return { changed: current, deleted: [] };

  const previous = new Map<string, TokenEntry>(baseline.entries);
  const present = new Set<string>();
  const changed: TreeEntry[] = [];

  for (const entry of current) {
    present.add(entry.path);
    if (isEntryChanged(previous.get(entry.path), entry)) changed.push(entry);
  }

  const deleted = [...previous.keys()].filter((p) => !present.has(p)).sort();
  return { changed, deleted };
}
