import { createReadStream, createWriteStream } from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGunzip, createGzip } from 'node:zlib';
import type { ArchiveHeader, ArchiveRecord, EntryRecord } from './archive-format.js';
import { nodeErrorCode } from '../../runtime/node-error-code.js';
import {
  ArchiveFormatError,
  ArchiveHeaderSchema,
  ArchiveRecordSchema,
  MAX_RECORD_LINE_BYTES,
  SourceChangedError,
  isSafeEntryPath,
} from './archive-format.js';

export interface EncodedEntry {
  readonly record: EntryRecord;
  /** File records only: exactly `record.size` bytes. */
  readonly content?: AsyncIterable<Buffer>;
}

export type ArchiveEvent =
  | { readonly kind: 'header'; readonly header: ArchiveHeader }
  | { readonly kind: 'record'; readonly record: EntryRecord }
  | { readonly kind: 'data'; readonly chunk: Buffer }
  | { readonly kind: 'end'; readonly entries: number };

function line(value: ArchiveHeader | ArchiveRecord): Buffer {
  return Buffer.from(`${JSON.stringify(value)}\n`, 'utf8');
}

/**
 * Serialize an archive (uncompressed). Throws `SourceChangedError` when file
 * content does not match the announced size.
 */
export async function* encodeArchive(
  header: ArchiveHeader,
  entries: AsyncIterable<EncodedEntry> | Iterable<EncodedEntry>
): AsyncGenerator<Buffer> {
  yield line(header);
  let count = 0;

  for await (const entry of entries) {
    yield line(entry.record);
    count += 1;

    if (entry.record.t !== 'file') continue;
    const expected = entry.record.size;
    let written = 0;
    if (entry.content) {
      for await (const chunk of entry.content) {
        written += chunk.byteLength;
        if (written > expected) {
          throw new SourceChangedError(entry.record.p, `${entry.record.p} grew while being archived`);
        }
        yield chunk;
      }
    }
    if (written !== expected) {
      throw new SourceChangedError(
        entry.record.p,
        `${entry.record.p} changed while being archived (expected ${expected} bytes, read ${written})`
      );
    }
  }

  yield line({ t: 'end', entries: count });
}

export async function writeArchiveFile(
  outFile: string,
  header: ArchiveHeader,
  entries: AsyncIterable<EncodedEntry> | Iterable<EncodedEntry>
): Promise<void> {
  await pipeline(Readable.from(encodeArchive(header, entries)), createGzip(), createWriteStream(outFile));
}

function parseLine(raw: Buffer): unknown {
  try {
    return JSON.parse(raw.toString('utf8'));
  } catch {
    throw new ArchiveFormatError('ARCHIVE_INVALID', 'Archive record is not valid JSON');
  }
}

/**
 * Streaming decoder. File content is emitted as `data` events following its
 * `record` event; nothing is buffered beyond one record line.
 */
export async function* decodeArchive(chunks: AsyncIterable<Buffer>): AsyncGenerator<ArchiveEvent> {
  let buffer: Buffer = Buffer.alloc(0);
  let header: ArchiveHeader | null = null;
  let remaining = 0;
  let records = 0;
  let done = false;

  const drain = function* (): Generator<ArchiveEvent> {
    for (;;) {
      if (remaining > 0) {
        if (buffer.length === 0) return;
        const take = Math.min(remaining, buffer.length);
        yield { kind: 'data', chunk: buffer.subarray(0, take) };
        buffer = buffer.subarray(take);
        remaining -= take;
        continue;
      }

      if (done) {
        if (buffer.length > 0) throw new ArchiveFormatError('ARCHIVE_INVALID', 'Unexpected data after end record');
        return;
      }

      const newline = buffer.indexOf(0x0a);
      if (newline < 0) {
        if (buffer.length > MAX_RECORD_LINE_BYTES) {
          throw new ArchiveFormatError('ARCHIVE_INVALID', 'Archive record line too long');
        }
        return;
      }
      const raw = buffer.subarray(0, newline);
      buffer = buffer.subarray(newline + 1);
      const value = parseLine(raw);

      if (header === null) {
        const parsed = ArchiveHeaderSchema.safeParse(value);
        if (!parsed.success) throw new ArchiveFormatError('ARCHIVE_INVALID', 'Missing or invalid archive header');
        header = parsed.data;
        yield { kind: 'header', header: parsed.data };
        continue;
      }

      const parsed = ArchiveRecordSchema.safeParse(value);
      if (!parsed.success) throw new ArchiveFormatError('ARCHIVE_INVALID', 'Invalid archive record');
      const record = parsed.data;

      if (record.t === 'end') {
        if (record.entries !== records) {
          throw new ArchiveFormatError(
            'ARCHIVE_INVALID',
            `End record announces ${record.entries} entries, found ${records}`
          );
        }
        done = true;
        yield { kind: 'end', entries: record.entries };
        continue;
      }

      if (!isSafeEntryPath(record.p)) {
        throw new ArchiveFormatError('ARCHIVE_PATH_UNSAFE', `Unsafe entry path: ${JSON.stringify(record.p)}`);
      }
      records += 1;
      if (record.t === 'file') remaining = record.size;
      yield { kind: 'record', record };
    }
  };

  for await (const chunk of chunks) {
    buffer = buffer.length === 0 ? chunk : Buffer.concat([buffer, chunk]);
    yield* drain();
  }

  if (!done || remaining > 0 || buffer.length > 0) {
    throw new ArchiveFormatError('ARCHIVE_INVALID', 'Archive is truncated');
  }
}

async function* gunzipFile(file: string): AsyncGenerator<Buffer> {
  const source = createReadStream(file);
  const gunzip = createGunzip();
  source.on('error', (e) => gunzip.destroy(e));
  source.pipe(gunzip);
  try {
    for await (const raw of gunzip) {
      const chunk: unknown = raw;
      if (!Buffer.isBuffer(chunk)) throw new ArchiveFormatError('ARCHIVE_INVALID', 'Unexpected stream chunk');
      yield chunk;
    }
  } catch (e) {
    if (e instanceof ArchiveFormatError) throw e;
    if (isZlibError(e)) throw new ArchiveFormatError('ARCHIVE_INVALID', `Archive is not valid gzip: ${e.message}`);
    throw e;
  } finally {
    source.destroy();
    gunzip.destroy();
  }
}

function isZlibError(e: unknown): e is Error {
  return e instanceof Error && (nodeErrorCode(e)?.startsWith('Z_') ?? false);
}

export function readArchiveFile(file: string): AsyncGenerator<ArchiveEvent> {
  return decodeArchive(gunzipFile(file));
}
