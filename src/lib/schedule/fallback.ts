import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { SnapshotNotFoundError, StorageError, errorMessage } from '@/lib/errors';
import type { Logger } from '@/lib/log';
import { loadSpeakerRatings, type SpeakerRatings } from '@/lib/ratings/load';
import { findIntegrityProblems } from '@/lib/schedule/integrity';
import type { ScheduleStore } from '@/lib/schedule/store';
import { snapshotSchema, type Snapshot } from '@/lib/schedule/types';

export const BUNDLED_SNAPSHOT_PATH = fileURLToPath(
  new URL('../../../data/fallback-snapshot.json', import.meta.url),
);

export type ScheduleSourceKind = 'database' | 'bundled';

export type LoadedSchedule = {
  snapshot: Snapshot;
  source: ScheduleSourceKind;
  ratings: SpeakerRatings;
};

export async function loadBundledSnapshot(
  filePath: string = BUNDLED_SNAPSHOT_PATH,
): Promise<Snapshot> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (err) {
    throw new StorageError(
      `Could not read bundled schedule: ${errorMessage(err)}`,
      { filePath },
    );
  }

  const parsed = snapshotSchema.safeParse(json);
  if (!parsed.success) {
    throw new StorageError(`Invalid bundled schedule at ${filePath}`, {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
  }
  const [problem] = findIntegrityProblems(parsed.data);
  if (problem) {
    throw new StorageError(`Invalid bundled schedule at ${filePath}: ${problem.message}`, {
      filePath,
      record: problem.record,
    });
  }
  return parsed.data;
}

/**
 * The schedule readers see: the last synced snapshot, or the bundled one
 * when no sync has completed, with speaker ratings joined in.
 */
export async function loadSchedule(params: {
  store: ScheduleStore;
  ratingsFile: string;
  logger: Logger;
  bundledPath?: string;
}): Promise<LoadedSchedule> {
  const ratings = await loadSpeakerRatings(params.ratingsFile, params.logger);
  try {
    const snapshot = await params.store.loadSnapshot();
    return { snapshot, source: 'database', ratings };
  } catch (err) {
    if (!(err instanceof SnapshotNotFoundError)) throw err;
  }

  params.logger.info('no synced schedule yet, using bundled data');
  const snapshot = await loadBundledSnapshot(params.bundledPath);
  return { snapshot, source: 'bundled', ratings };
}
