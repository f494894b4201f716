import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse } from 'dotenv';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { EnvFileUnreadableError } from '../errors/app-error.js';
import { nodeErrorCode } from '../runtime/node-error-code.js';

export const DEFAULT_STACK_DIR = '/home/docker/paperless-setup';

export type EnvRecord = Readonly<Record<string, string | undefined>>;

/**
 * Path of the stack's env file as named by the process environment.
 * Relative `ENV_FILE` values are resolved against `STACK_DIR`.
 */
export function envFilePath(env: EnvRecord): string {
  const stackDir = env['STACK_DIR']?.trim() || DEFAULT_STACK_DIR;
  return path.resolve(stackDir, env['ENV_FILE']?.trim() || '.env');
}

/**
 * The process environment layered over the stack's env file, so `POSTGRES_DB`
 * and friends come from the same file compose reads. A missing file is fine.
 */
export function readEnvSources(
  env: EnvRecord,
  readFile: (file: string) => string = (file) => fs.readFileSync(file, 'utf-8')
): Result<EnvRecord, EnvFileUnreadableError> {
  const file = envFilePath(env);
  let content: string;
  try {
    content = readFile(file);
  } catch (e) {
    if (nodeErrorCode(e) === 'ENOENT') return ok(env);
    return err(Err.envFileUnreadable(file, e instanceof Error ? e.message : String(e)));
  }
  return ok({ ...parse(content), ...definedOnly(env) });
}

function definedOnly(env: EnvRecord): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
