/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 * - Only the composition root reads the environment; everything else receives
 *   the validated struct
 */

import * as path from 'node:path';
import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { Namespace } from '../engine/domain/ids.js';
import { parseNamespace } from '../engine/domain/ids.js';
import type { RetentionPolicy } from '../engine/domain/retention.js';
import type { RetryPolicy } from '../runtime/with-retry.js';
import type { LogLevel } from '../core/logging/types.js';
import type { ConfigBackupMode } from '../engine/usecases/config-bundler.js';
import { DEFAULT_STACK_DIR } from './env-source.js';

export type RemoteConfig =
  | {
      readonly kind: 'rclone';
      readonly remoteName: string;
      readonly remotePath: string;
    }
  | {
      readonly kind: 'local';
      readonly root: string;
    };

export interface AppConfig {
  readonly instanceName: string;
  readonly namespace: Namespace;
  readonly hostIdentity: string;
  readonly paths: {
    readonly dataRoot: string;
    readonly stackDir: string;
    readonly composeFile: string;
    readonly envFile: string;
    readonly stateDir: string;
  };
  readonly compose: {
    readonly projectName: string;
    readonly dbService: string;
    readonly appService: string;
    readonly timeoutMs: number;
  };
  readonly database: {
    readonly name: string;
    readonly user: string;
    readonly readyAttempts: number;
    readonly readyDelayMs: number;
  };
  readonly remote: RemoteConfig;
  readonly remoteCalls: {
    readonly timeoutMs: number;
    readonly retry: RetryPolicy;
  };
  readonly configBackup: {
    readonly mode: ConfigBackupMode;
    readonly passphraseFile: string;
    readonly includeCompose: boolean;
  };
  readonly retention: RetentionPolicy;
  readonly maxChainHops: number;
  readonly logLevel: LogLevel;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  /** Used in manifests as provenance. */
  readonly hostIdentity: string;
  /** Base for defaults that live in the operator's home. */
  readonly homeDir: string;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const intFromEnv = (min: number, max: number, fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(z.number().int(`must be an integer`).min(min).max(max).default(fallback));

const yesNo = (fallback: 'yes' | 'no') =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? fallback : v.trim().toLowerCase()))
    .pipe(z.enum(['yes', 'no', 'true', 'false', '1', '0']))
    .transform((v) => v === 'yes' || v === 'true' || v === '1');

const optionalPath = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v.trim()));

const EnvSchema = z.object({
  INSTANCE_NAME: z.string().trim().min(1).default('docsnap'),
  DATA_ROOT: optionalPath,
  STACK_DIR: optionalPath,
  COMPOSE_FILE: optionalPath,
  ENV_FILE: optionalPath,
  COMPOSE_PROJECT_NAME: optionalPath,
  DOCSNAP_STATE_DIR: optionalPath,

  DOCSNAP_REMOTE_KIND: z.enum(['rclone', 'local']).default('rclone'),
  RCLONE_REMOTE_NAME: z.string().trim().min(1).default('backup'),
  RCLONE_REMOTE_PATH: z.string().trim().default('backups'),
  DOCSNAP_LOCAL_REMOTE_ROOT: optionalPath,

  POSTGRES_DB: z.string().trim().min(1).default('paperless'),
  POSTGRES_USER: z.string().trim().min(1).default('paperless'),
  DOCSNAP_DB_SERVICE: z.string().trim().min(1).default('db'),
  DOCSNAP_APP_SERVICE: z.string().trim().min(1).default('webserver'),
  DOCSNAP_DB_READY_ATTEMPTS: intFromEnv(1, 600, 30),
  DOCSNAP_COMPOSE_TIMEOUT_MS: intFromEnv(1_000, 86_400_000, 3_600_000),

  ENV_BACKUP_MODE: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? 'sealed' : v.trim().toLowerCase()))
    .pipe(z.enum(['none', 'plain', 'sealed'])),
  ENV_BACKUP_PASSPHRASE_FILE: optionalPath,
  INCLUDE_COMPOSE_IN_BACKUP: yesNo('yes'),

  RETENTION_DAYS: intFromEnv(0, 36_500, 30),
  RETENTION_MONTHLY_DAYS: intFromEnv(0, 36_500, 180),
  DOCSNAP_ARCHIVE_MONTHLY_ONLY: yesNo('yes'),
  DOCSNAP_MAX_CHAIN_HOPS: intFromEnv(1, 10_000, 64),

  DOCSNAP_REMOTE_TIMEOUT_MS: intFromEnv(1_000, 86_400_000, 1_800_000),
  DOCSNAP_REMOTE_RETRIES: intFromEnv(0, 20, 3),

  DOCSNAP_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? 'info' : v.trim().toLowerCase()))
    .pipe(z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return buildConfig(parsed.data, options).map((config) => config as ValidatedConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, options: LoadConfigOptions): Result<AppConfig, ConfigInvalidError> {
  const issues: ConfigIssue[] = [];

  const namespace = parseNamespace(env.INSTANCE_NAME);
  if (namespace === null) {
    issues.push({ path: 'INSTANCE_NAME', message: 'must be letters, digits, ".", "_" or "-" (segments separated by "/")' });
  }

  let remote: RemoteConfig | null = null;
  if (env.DOCSNAP_REMOTE_KIND === 'local') {
    if (env.DOCSNAP_LOCAL_REMOTE_ROOT === undefined) {
      issues.push({ path: 'DOCSNAP_LOCAL_REMOTE_ROOT', message: 'required when DOCSNAP_REMOTE_KIND=local' });
    } else {
      remote = { kind: 'local', root: path.resolve(env.DOCSNAP_LOCAL_REMOTE_ROOT) };
    }
  } else {
    remote = { kind: 'rclone', remoteName: env.RCLONE_REMOTE_NAME.replace(/:$/, ''), remotePath: env.RCLONE_REMOTE_PATH };
  }

  if (env.RETENTION_DAYS > 0 && env.RETENTION_MONTHLY_DAYS > 0 && env.RETENTION_MONTHLY_DAYS < env.RETENTION_DAYS) {
    issues.push({ path: 'RETENTION_MONTHLY_DAYS', message: 'must not be shorter than RETENTION_DAYS' });
  }

  if (namespace === null || remote === null || issues.length > 0) {
    return err(Err.configInvalid(issues));
  }

  const stackDir = path.resolve(env.STACK_DIR ?? DEFAULT_STACK_DIR);
  const stateDir = path.resolve(env.DOCSNAP_STATE_DIR ?? path.join(options.homeDir, '.local', 'state', 'docsnap'));

  return ok({
    instanceName: env.INSTANCE_NAME,
    namespace,
    hostIdentity: options.hostIdentity,
    paths: {
      dataRoot: path.resolve(env.DATA_ROOT ?? '/home/docker/paperless'),
      stackDir,
      composeFile: path.resolve(stackDir, env.COMPOSE_FILE ?? 'docker-compose.yml'),
      envFile: path.resolve(stackDir, env.ENV_FILE ?? '.env'),
      stateDir,
    },
    compose: {
      projectName: env.COMPOSE_PROJECT_NAME ?? env.INSTANCE_NAME.replace(/[^a-z0-9_-]/gi, '-').toLowerCase(),
      dbService: env.DOCSNAP_DB_SERVICE,
      appService: env.DOCSNAP_APP_SERVICE,
      timeoutMs: env.DOCSNAP_COMPOSE_TIMEOUT_MS,
    },
    database: {
      name: env.POSTGRES_DB,
      user: env.POSTGRES_USER,
      readyAttempts: env.DOCSNAP_DB_READY_ATTEMPTS,
      readyDelayMs: 2_000,
    },
    remote,
    remoteCalls: {
      timeoutMs: env.DOCSNAP_REMOTE_TIMEOUT_MS,
      retry: { attempts: env.DOCSNAP_REMOTE_RETRIES + 1, baseDelayMs: 2_000, maxDelayMs: 30_000 },
    },
    configBackup: {
      mode: env.ENV_BACKUP_MODE,
      passphraseFile: path.resolve(env.ENV_BACKUP_PASSPHRASE_FILE ?? path.join(stateDir, 'env-passphrase')),
      includeCompose: env.INCLUDE_COMPOSE_IN_BACKUP,
    },
    retention: {
      recentDays: env.RETENTION_DAYS,
      archiveDays: env.RETENTION_MONTHLY_DAYS,
      archiveMonthlyOnly: env.DOCSNAP_ARCHIVE_MONTHLY_ONLY,
      incompleteGraceHours: 24,
    },
    maxChainHops: env.DOCSNAP_MAX_CHAIN_HOPS,
    logLevel: env.DOCSNAP_LOG_LEVEL,
  });
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
