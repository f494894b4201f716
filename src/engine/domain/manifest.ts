import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { SnapshotId, Sha256Digest } from './ids.js';
import { parseSnapshotId, asSha256Digest } from './ids.js';
import type { ArtifactDomain } from './snapshot-kind.js';
import type { EngineError } from './errors.js';
import { EngineErr } from './errors.js';

/**
 * On-disk and remote snapshot layout (identical):
 *
 *   <namespace>/<snapshotId>/media
 *   <namespace>/<snapshotId>/data
 *   <namespace>/<snapshotId>/export
 *   <namespace>/<snapshotId>/config | config.enc
 *   <namespace>/<snapshotId>/database
 *   <namespace>/<snapshotId>/manifest      <- written and uploaded last (commit marker)
 */
export const MANIFEST_FILE = 'manifest';
export const SEALED_CONFIG_FILE = 'config.enc';

export const MANIFEST_FORMAT_VERSION = 1;

export const SnapshotIdSchema = z
  .string()
  .transform((raw, ctx): SnapshotId => {
    const id = parseSnapshotId(raw);
    if (id === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a snapshot id: ${raw}` });
      return z.NEVER;
    }
    return id;
  });

export const Sha256Schema = z
  .string()
  .regex(/^sha256:[0-9a-f]{64}$/, 'Expected sha256:<64 hex>')
  .transform((v): Sha256Digest => asSha256Digest(v));

const ArtifactRecordSchema = z.object({
  file: z.string().min(1),
  sizeBytes: z.number().int().nonnegative(),
  sha256: Sha256Schema,
  /** Tree domains only: recursive digest of the domain tree at capture time. */
  treeSha256: Sha256Schema.optional(),
  /** Tree domains only: whether this artifact replaces the tree or layers on top. */
  archiveMode: z.enum(['full', 'incremental']).optional(),
  entryCount: z.number().int().nonnegative().optional(),
});

export const ManifestSchema = z
  .object({
    v: z.literal(MANIFEST_FORMAT_VERSION),
    id: SnapshotIdSchema,
    kind: z.enum(['full', 'incremental', 'archive']),
    parentId: SnapshotIdSchema.nullable(),
    status: z.enum(['pending', 'verified', 'failed']),
    namespace: z.string().min(1),
    createdAt: z.string().datetime(),
    completedAt: z.string().datetime(),
    hostIdentity: z.string(),
    applicationVersionTag: z.string(),
    engineVersion: z.string(),
    configSealed: z.boolean(),
    artifacts: z.object({
      media: ArtifactRecordSchema.optional(),
      data: ArtifactRecordSchema.optional(),
      export: ArtifactRecordSchema.optional(),
      config: ArtifactRecordSchema.optional(),
      database: ArtifactRecordSchema.optional(),
    }),
    skippedDomains: z.array(z.enum(['media', 'data', 'export'])),
    integrityProblems: z.array(z.string()),
  })
  .superRefine((m, ctx) => {
    if (m.kind === 'incremental' && m.parentId === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['parentId'], message: 'incremental snapshot requires parentId' });
    }
    if (m.kind !== 'incremental' && m.parentId !== null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['parentId'], message: `${m.kind} snapshot must not have parentId` });
    }
    if (m.parentId !== null && m.parentId >= m.id) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['parentId'], message: 'parentId must be older than id' });
    }
    if (m.status === 'verified' && m.artifacts.database === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['artifacts', 'database'], message: 'verified snapshot requires a database dump' });
    }
  });

export type ArtifactRecord = z.infer<typeof ArtifactRecordSchema>;
export type SnapshotManifest = z.infer<typeof ManifestSchema>;

export function artifactFileName(domain: ArtifactDomain, sealed: boolean): string {
  return domain === 'config' && sealed ? SEALED_CONFIG_FILE : domain;
}

export function serializeManifest(manifest: SnapshotManifest): string {
  return `${JSON.stringify(manifest, null, 2)}\n`;
}

export function parseManifest(raw: string, source: string): Result<SnapshotManifest, EngineError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return err(EngineErr.corruption('MANIFEST_INVALID', `Manifest is not valid JSON: ${source}`));
  }

  const validated = ManifestSchema.safeParse(parsed);
  if (!validated.success) {
    const first = validated.error.errors[0];
    const detail = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'unknown';
    return err(EngineErr.corruption('MANIFEST_INVALID', `Invalid manifest ${source} (${detail})`));
  }
  return ok(validated.data);
}

/**
 * Artifact files a manifest references, in upload order (manifest excluded).
 */
export function referencedFiles(manifest: SnapshotManifest): readonly { readonly domain: ArtifactDomain; readonly record: ArtifactRecord }[] {
  const order: readonly ArtifactDomain[] = ['database', 'media', 'data', 'export', 'config'];
  const out: { domain: ArtifactDomain; record: ArtifactRecord }[] = [];
  for (const domain of order) {
    const record = manifest.artifacts[domain];
    if (record) out.push({ domain, record });
  }
  return out;
}
