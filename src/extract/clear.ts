import { readdir, rm, rmdir } from 'node:fs/promises';
import path from 'node:path';
import { systemErrorCode } from '../errors.js';

/**
 * Remove every file below `dir` and the directories that end up empty,
 * leaving `dir` itself and the top-level files named in `keep`.
 */
export async function clearDirectory(dir: string, keep: ReadonlySet<string> = new Set()): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
    if (systemErrorCode(err) === 'ENOENT') return [];
    throw err;
  });
  for (const entry of entries) {
    const target = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await clearDirectory(target);
      await removeEmptyDirectory(target);
      continue;
    }
    if (keep.has(entry.name)) continue;
    await rm(target, { force: true });
  }
}

async function removeEmptyDirectory(dir: string): Promise<void> {
  try {
    await rmdir(dir);
  } catch (err) {
    const code = systemErrorCode(err);
    if (code === 'ENOENT' || code === 'ENOTEMPTY' || code === 'EEXIST') return;
    throw err;
  }
}
