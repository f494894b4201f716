import { z } from 'zod';

/**
 * Artifact archive format (before gzip):
 *
 *   {"t":"archive","v":1,...}\n           header, exactly once
 *   {"t":"delete","p":"a/old.txt"}\n      incremental only, before any write
 *   {"t":"dir","p":"a","mode":493,...}\n
 *   {"t":"file","p":"a/b.pdf","size":N,...}\n<N raw bytes>
 *   {"t":"symlink","p":"a/l","target":"b.pdf"}\n
 *   {"t":"end","entries":K}\n             K = number of records between header and end
 *
 * Record lines are JSON, so paths containing newlines stay on one line.
 * Entry paths are relative, `/`-separated and never contain `.`, `..` or
 * empty segments.
 */
export const ARCHIVE_FORMAT_VERSION = 1;

/** Longest header line the decoder accepts. */
export const MAX_RECORD_LINE_BYTES = 64 * 1024;

export type ArchiveMode = 'full' | 'incremental';

export const ArchiveHeaderSchema = z.object({
  t: z.literal('archive'),
  v: z.literal(ARCHIVE_FORMAT_VERSION),
  domain: z.enum(['media', 'data', 'export', 'config']),
  mode: z.enum(['full', 'incremental']),
  snapshotId: z.string(),
  baselineId: z.string().nullable(),
});

export type ArchiveHeader = z.infer<typeof ArchiveHeaderSchema>;

const ModeSchema = z.number().int().min(0).max(0o7777);
const MtimeSchema = z.number().int().nonnegative();

export const ArchiveRecordSchema = z.discriminatedUnion('t', [
  z.object({ t: z.literal('dir'), p: z.string(), mode: ModeSchema, mtimeMs: MtimeSchema }),
  z.object({
    t: z.literal('file'),
    p: z.string(),
    size: z.number().int().nonnegative(),
    mode: ModeSchema,
    mtimeMs: MtimeSchema,
  }),
  z.object({ t: z.literal('symlink'), p: z.string(), target: z.string().min(1), mtimeMs: MtimeSchema }),
  z.object({ t: z.literal('delete'), p: z.string() }),
  z.object({ t: z.literal('end'), entries: z.number().int().nonnegative() }),
]);

export type ArchiveRecord = z.infer<typeof ArchiveRecordSchema>;
export type EntryRecord = Exclude<ArchiveRecord, { t: 'end' }>;

export type ArchiveFormatErrorCode = 'ARCHIVE_INVALID' | 'ARCHIVE_PATH_UNSAFE';

export class ArchiveFormatError extends Error {
  constructor(
    readonly code: ArchiveFormatErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ArchiveFormatError';
  }
}

/**
 * Raised by the encoder when a file yields a different number of bytes than
 * its record announced (the file changed while it was being read).
 */
export class SourceChangedError extends Error {
  constructor(readonly entryPath: string, message: string) {
    super(message);
    this.name = 'SourceChangedError';
  }
}

export function isSafeEntryPath(p: string): boolean {
  if (p.length === 0 || p.startsWith('/') || p.includes('\0')) return false;
  return p.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
}
