import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { SourceId } from '../types.js';
import { formatRunStamp } from '../utils/date.js';

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Deterministic artifact stem: `<prefix>_<source>_<YYYYMMDD_HHmmss>`.
 */
export function artifactStem(prefix: string, source: SourceId, runAt: Date): string {
  return `${prefix}_${source}_${formatRunStamp(runAt)}`;
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

/**
 * Create a new, empty file for `<stem><ext>` without ever replacing an existing
 * one; on a collision the name gets a `_<n>` suffix. Returns the created path.
 */
export async function reserveFile(dir: string, stem: string, ext: string): Promise<string> {
  await ensureDir(dir);
  for (let attempt = 0; ; attempt++) {
    const name = attempt === 0 ? `${stem}${ext}` : `${stem}_${attempt}${ext}`;
    const file = path.join(dir, name);
    try {
      const handle = await fs.open(file, 'wx');
      await handle.close();
      return file;
    } catch (err) {
      if (!isAlreadyExists(err)) throw err;
    }
  }
}

/**
 * Write `content` to a freshly reserved file and return its path.
 */
export async function writeNewFile(dir: string, stem: string, ext: string, content: string): Promise<string> {
  const file = await reserveFile(dir, stem, ext);
  await fs.writeFile(file, content, 'utf-8');
  return file;
}
