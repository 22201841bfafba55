import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

/**
 * Ensures the parent directory of `path` exists.
 */
export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes through a temporary sibling and renames it into place, so readers
 * never observe a half-written file.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, path);
}
