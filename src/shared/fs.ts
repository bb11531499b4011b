/**
 * Filesystem helpers
 */

import { promises as fs } from 'node:fs';
import { dirname, join, basename } from 'node:path';
import { randomBytes } from 'node:crypto';

export function isEnoent(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}

/**
 * Reads a file as UTF-8 text, returning null if the file does not exist.
 * Rethrows any error that is not ENOENT.
 */
export async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isEnoent(err)) return null;
    throw err;
  }
}

/**
 * Writes to a temporary sibling file, then renames it over `filePath`, so
 * readers see either the old content or the new content, never a mix.
 * Creates the parent directory when missing.
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmpPath = join(dir, `.${basename(filePath)}.tmp-${randomBytes(6).toString('hex')}`);

  await fs.mkdir(dir, { recursive: true });
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.unlink(tmpPath).catch(() => {
      // the write/rename error is the one reported
    });
    throw error;
  }
}
