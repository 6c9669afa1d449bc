/**
 * Atomic Write Utilities
 *
 * Layer files are rewritten in place, so a crash mid-write must leave either
 * the old file or the new one. Pattern: write a temp file beside the target,
 * then rename over it (atomic on POSIX).
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from './logger.js';

const log = createLogger({ module: 'atomic-write' });

/**
 * Atomically write string data to file
 *
 * @example
 * ```typescript
 * await atomicWriteFile('data/tierb_after_tiera_by_zone.csv', csv);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent writers off each other's temp files
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      log.debug('Temp file cleanup failed', {
        tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}
