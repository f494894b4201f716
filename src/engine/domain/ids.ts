import type { Brand } from '../../runtime/brand.js';

/**
 * Branded type: SnapshotId (`YYYY-MM-DD_HH-MM-SS`, UTC).
 *
 * Footgun prevented:
 * - Prevents passing arbitrary remote directory names where a snapshot id is expected
 * - Lexical order of ids equals chronological order
 *
 * How to construct:
 * - `formatSnapshotId(ms)` for new snapshots
 * - `parseSnapshotId(raw)` for anything read from the remote or the CLI
 */
export type SnapshotId = Brand<string, 'SnapshotId'>;

/**
 * Branded type: Namespace (remote prefix owned by one deployment instance).
 *
 * Relative, `/`-separated, no empty or `..` segments.
 */
export type Namespace = Brand<string, 'Namespace'>;

/** `sha256:<hex>` */
export type Sha256Digest = Brand<string, 'Sha256Digest'>;

const SNAPSHOT_ID_PATTERN = /^(\d{4})-(\d{2})-(\d{2})_(\d{2})-(\d{2})-(\d{2})$/;
const NAMESPACE_SEGMENT_PATTERN = /^[A-Za-z0-9._-]+$/;

export function asSha256Digest(value: string): Sha256Digest {
  return value as Sha256Digest;
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

export function formatSnapshotId(epochMs: number): SnapshotId {
  const d = new Date(epochMs);
  const date = `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())}`;
  const time = `${pad2(d.getUTCHours())}-${pad2(d.getUTCMinutes())}-${pad2(d.getUTCSeconds())}`;
  return `${date}_${time}` as SnapshotId;
}

/**
 * Parse an id and return its UTC timestamp, or null when the string is not a
 * well-formed snapshot id (including impossible dates such as month 13).
 */
export function snapshotIdToEpochMs(raw: string): number | null {
  const m = SNAPSHOT_ID_PATTERN.exec(raw);
  if (!m) return null;
  const [, y, mo, d, h, mi, s] = m.map(Number);
  const ms = Date.UTC(y, mo - 1, d, h, mi, s);
  // Date.UTC silently rolls over out-of-range fields; reject those.
  return formatSnapshotId(ms) === raw ? ms : null;
}

export function parseSnapshotId(raw: string): SnapshotId | null {
  return snapshotIdToEpochMs(raw) === null ? null : (raw as SnapshotId);
}

/**
 * Id for a snapshot created at `nowMs`, strictly greater than every existing id.
 * Two snapshots started within the same second get consecutive seconds.
 */
export function nextSnapshotId(nowMs: number, existing: readonly SnapshotId[]): SnapshotId {
  let candidateMs = Math.floor(nowMs / 1000) * 1000;
  const latest = existing.length > 0 ? existing.reduce((a, b) => (a > b ? a : b)) : null;
  if (latest !== null) {
    const latestMs = snapshotIdToEpochMs(latest);
    if (latestMs !== null && latestMs >= candidateMs) candidateMs = latestMs + 1000;
  }
  return formatSnapshotId(candidateMs);
}

export function parseNamespace(raw: string): Namespace | null {
  const trimmed = raw.replace(/^\/+|\/+$/g, '');
  if (trimmed.length === 0) return null;
  const segments = trimmed.split('/');
  const valid = segments.every((s) => s !== '.' && s !== '..' && NAMESPACE_SEGMENT_PATTERN.test(s));
  return valid ? (trimmed as Namespace) : null;
}

/**
 * Single path segment rendering of a namespace, used for local state paths.
 * Percent-encoding keeps distinct namespaces distinct.
 */
export function namespaceSlug(ns: Namespace): string {
  return encodeURIComponent(ns);
}
