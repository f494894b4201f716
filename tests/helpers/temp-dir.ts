import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach } from 'vitest';

/**
 * Temp directories removed after each test of the calling file.
 */
export function useTempDirs(): (label?: string) => Promise<string> {
  const created: string[] = [];

  afterEach(async () => {
    await Promise.all(created.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
  });

  return async (label = 'docsnap') => {
    const dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), `${label}-`)));
    created.push(dir);
    return dir;
  };
}

/** Write files below `root`, creating parent directories. */
export async function writeTree(root: string, files: Readonly<Record<string, string>>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content);
  }
}

/** Every regular file below `root` with its content, keyed by `/`-separated path. */
export async function readTree(root: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  const walk = async (rel: string): Promise<void> => {
    const entries = await fs.readdir(path.join(root, rel), { withFileTypes: true });
    for (const entry of entries) {
      const childRel = rel === '' ? entry.name : `${rel}/${entry.name}`;
      if (entry.isDirectory()) await walk(childRel);
      else if (entry.isFile()) out[childRel] = await fs.readFile(path.join(root, childRel), 'utf8');
    }
  };
  await walk('');
  return out;
}
