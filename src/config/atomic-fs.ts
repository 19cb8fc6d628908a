/**
 * Crash-safe file replacement: write a temp file beside the target, fsync it,
 * then rename over the target. Readers see the old file or the new one,
 * never a partial write.
 */

import { randomBytes } from 'crypto';
import { open, rename, unlink } from 'fs/promises';
import { basename, dirname, join } from 'path';

function getTmpPath(targetPath: string): string {
  const suffix = randomBytes(8).toString('hex');
  return join(dirname(targetPath), `.${basename(targetPath)}.tmp-${suffix}`);
}

/**
 * Atomically replace `targetPath` with `content`.
 *
 * @param mode - Permission bits for the new file (default owner read/write)
 */
export async function atomicWriteFile(
  targetPath: string,
  content: string | Uint8Array,
  mode = 0o600
): Promise<void> {
  const tmpPath = getTmpPath(targetPath);

  try {
    const handle = await open(tmpPath, 'w', mode);
    try {
      await handle.writeFile(content);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmpPath, targetPath);
  } catch (err) {
    await unlink(tmpPath).catch(() => undefined);
    throw err;
  }
}

/**
 * Remove a file, treating a missing file as success.
 */
export async function removeIfExists(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') throw err;
  }
}
