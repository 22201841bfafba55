import fs from 'fs';
import path from 'path';
import archiver from 'archiver';
import { ensureDir } from 'fs-extra';

export interface BundleEntry {
  /** File on disk */
  file: string;
  /** Name inside the archive */
  name: string;
}

/**
 * Packs files into a zip archive at `outputPath`. Resolves once the archive
 * is fully flushed to disk.
 */
export async function writeBundle(outputPath: string, entries: readonly BundleEntry[]): Promise<string> {
  const target = path.resolve(outputPath);
  await ensureDir(path.dirname(target));

  const output = fs.createWriteStream(target);
  const archive = archiver('zip', { zlib: { level: 9 } });
  const closed = new Promise<void>((resolve, reject) => {
    output.on('close', () => resolve());
    output.on('error', reject);
    // every entry was just written, so a missing file is an error here
    archive.on('warning', reject);
    archive.on('error', reject);
  });

  archive.pipe(output);
  for (const entry of entries) {
    archive.file(entry.file, { name: entry.name });
  }
  await Promise.all([archive.finalize(), closed]);
  return target;
}
