import { readdir, unlink } from 'node:fs/promises';
import path from 'node:path';

import { errorMessage, isErrnoException } from '@/lib/errors';
import type { Logger } from '@/lib/log';
import { SCHEDULE_DB_TMP_PREFIX } from '@/lib/schedule/store-sqlite';

/**
 * Deletes temporary databases left behind by a sync that crashed before its
 * rename. Must only run while holding the sync lock.
 */
export async function cleanupStaleTempFiles(
  dataDir: string,
  logger: Logger,
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dataDir);
  } catch (err) {
    // no data dir yet
    if (isErrnoException(err, 'ENOENT')) return [];
    throw err;
  }

  const deleted: string[] = [];
  for (const name of entries) {
    if (!name.startsWith(SCHEDULE_DB_TMP_PREFIX)) continue;
    try {
      await unlink(path.join(dataDir, name));
      deleted.push(name);
    } catch (err) {
      logger.warn('could not delete temporary database', {
        name,
        error: errorMessage(err),
      });
    }
  }

  if (deleted.length > 0) {
    logger.info(`cleanup deleted ${deleted.length} temporary database files`, {
      files: deleted,
    });
  }
  return deleted.sort();
}
