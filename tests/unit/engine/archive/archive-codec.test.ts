import { describe, expect, it } from 'vitest';
import type { ArchiveEvent, EncodedEntry } from '../../../../src/engine/archive/archive-codec.js';
import { decodeArchive, encodeArchive } from '../../../../src/engine/archive/archive-codec.js';
import type { ArchiveHeader } from '../../../../src/engine/archive/archive-format.js';
import { ArchiveFormatError, SourceChangedError, isSafeEntryPath } from '../../../../src/engine/archive/archive-format.js';

const header: ArchiveHeader = {
  t: 'archive',
  v: 1,
  domain: 'media',
  mode: 'incremental',
  snapshotId: '2026-03-10_12-00-00',
  baselineId: '2026-03-09_12-00-00',
};

async function* chunksOf(...parts: string[]): AsyncGenerator<Buffer> {
  for (const part of parts) yield Buffer.from(part, 'utf8');
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

async function encode(entries: EncodedEntry[]): Promise<Buffer> {
  return Buffer.concat(await collect(encodeArchive(header, entries)));
}

function line(value: unknown): string {
  return `${JSON.stringify(value)}\n`;
}

describe('archive codec', () => {
  it('writes the header, records, file bytes and an end record', async () => {
    const bytes = await encode([
      { record: { t: 'delete', p: 'old.pdf' } },
      { record: { t: 'dir', p: 'inbox', mode: 0o755, mtimeMs: 1 } },
      { record: { t: 'file', p: 'inbox/a.txt', size: 5, mode: 0o644, mtimeMs: 2 }, content: chunksOf('he', 'llo') },
    ]);

    expect(bytes.toString('utf8')).toBe(
      line(header) +
        line({ t: 'delete', p: 'old.pdf' }) +
        line({ t: 'dir', p: 'inbox', mode: 0o755, mtimeMs: 1 }) +
        line({ t: 'file', p: 'inbox/a.txt', size: 5, mode: 0o644, mtimeMs: 2 }) +
        'hello' +
        line({ t: 'end', entries: 3 })
    );
  });

  it('decodes regardless of how the stream is chunked', async () => {
    const bytes = await encode([
      { record: { t: 'file', p: 'a\nb.txt', size: 3, mode: 0o600, mtimeMs: 9 }, content: chunksOf('abc') },
      { record: { t: 'symlink', p: 'link', target: 'a\nb.txt', mtimeMs: 9 } },
    ]);

    async function* oneByteAtATime(): AsyncGenerator<Buffer> {
      for (let i = 0; i < bytes.length; i++) yield bytes.subarray(i, i + 1);
    }

    const events = await collect(decodeArchive(oneByteAtATime()));
    const data = Buffer.concat(
      events.flatMap((e: ArchiveEvent) => (e.kind === 'data' ? [e.chunk] : []))
    ).toString('utf8');
    const records = events.flatMap((e) => (e.kind === 'record' ? [e.record.p] : []));

    expect(events[0]).toEqual({ kind: 'header', header });
    expect(records).toEqual(['a\nb.txt', 'link']);
    expect(data).toBe('abc');
    expect(events[events.length - 1]).toEqual({ kind: 'end', entries: 2 });
  });

  it('fails when a file yields fewer bytes than announced', async () => {
    await expect(
      encode([{ record: { t: 'file', p: 'a.txt', size: 10, mode: 0o644, mtimeMs: 1 }, content: chunksOf('short') }])
    ).rejects.toBeInstanceOf(SourceChangedError);
  });

  it('fails when a file grows while it is read', async () => {
    await expect(
      encode([{ record: { t: 'file', p: 'a.txt', size: 2, mode: 0o644, mtimeMs: 1 }, content: chunksOf('longer') }])
    ).rejects.toThrow('a.txt grew while being archived');
  });

  it('rejects a truncated archive', async () => {
    const bytes = await encode([{ record: { t: 'dir', p: 'x', mode: 0o755, mtimeMs: 1 } }]);
    const cut = bytes.subarray(0, bytes.length - 5).toString('utf8');
    await expect(collect(decodeArchive(chunksOf(cut)))).rejects.toThrow('Archive is truncated');
  });

  it('rejects an end record that miscounts', async () => {
    const raw = line(header) + line({ t: 'dir', p: 'x', mode: 0o755, mtimeMs: 1 }) + line({ t: 'end', entries: 2 });
    await expect(collect(decodeArchive(chunksOf(raw)))).rejects.toThrow('End record announces 2 entries, found 1');
  });

  it('rejects entry paths that escape the target', async () => {
    const raw = line(header) + line({ t: 'delete', p: '../etc/passwd' }) + line({ t: 'end', entries: 1 });
    const failure = await collect(decodeArchive(chunksOf(raw))).catch((e: unknown) => e);
    expect(failure).toBeInstanceOf(ArchiveFormatError);
    if (failure instanceof ArchiveFormatError) expect(failure.code).toBe('ARCHIVE_PATH_UNSAFE');
  });

  it('rejects a stream without a header', async () => {
    await expect(collect(decodeArchive(chunksOf(line({ t: 'end', entries: 0 }))))).rejects.toThrow(
      'Missing or invalid archive header'
    );
  });

  it('classifies entry paths', () => {
    expect(isSafeEntryPath('a/b.pdf')).toBe(true);
    expect(isSafeEntryPath('')).toBe(false);
    expect(isSafeEntryPath('/abs')).toBe(false);
    expect(isSafeEntryPath('a/../b')).toBe(false);
    expect(isSafeEntryPath('a//b')).toBe(false);
    expect(isSafeEntryPath('./a')).toBe(false);
  });
});
