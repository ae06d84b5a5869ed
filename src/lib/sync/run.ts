import type { CalendarStore } from '@/lib/calendar/store-file';
import { reconcileDanglingReferences } from '@/lib/calendar/selection';
import type { Config } from '@/lib/env';
import {
  ConfschedError,
  SyncAbortedError,
  errorMessage,
  type ConfschedErrorCode,
  type ErrorMeta,
} from '@/lib/errors';
import type { Logger } from '@/lib/log';
import type { ScheduleStore } from '@/lib/schedule/store';
import type { Snapshot } from '@/lib/schedule/types';
import { cleanupStaleTempFiles } from '@/lib/sync/cleanup';
import { runFetchPhases } from '@/lib/sync/fetcher';
import { acquireSyncLock, type SyncLock } from '@/lib/sync/lock';
import {
  reconcile,
  type PartialSession,
  type PartialSpeaker,
} from '@/lib/sync/reconcile';
import type { Sleep } from '@/lib/sync/retry';
import type { ItemFailure, ScheduleSource } from '@/lib/sync/types';

export type SyncConfig = Pick<
  Config,
  | 'dataDir'
  | 'timezone'
  | 'year'
  | 'sessionMinutes'
  | 'concurrency'
  | 'maxAttempts'
  | 'retryBaseMs'
  | 'requestDelayMs'
>;

export type SyncDeps = {
  config: SyncConfig;
  source: ScheduleSource;
  store: ScheduleStore;
  calendarStore: CalendarStore;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: () => Date;
};

export type SyncReport = {
  fetchedAt: string;
  counts: {
    sessions: number;
    speakers: number;
    tracks: number;
    specialEvents: number;
  };
  partialSessions: PartialSession[];
  partialSpeakers: PartialSpeaker[];
  failures: ItemFailure[];
  danglingSelections: string[];
  removedTempFiles: string[];
};

export type SyncFailure = {
  code: ConfschedErrorCode | 'INTERNAL';
  message: string;
  meta: ErrorMeta;
};

export type SyncOutcome =
  | { ok: true; report: SyncReport }
  | { ok: false; error: SyncFailure };

function toSyncFailure(err: unknown): SyncFailure {
  if (err instanceof ConfschedError) {
    return { code: err.code, message: err.message, meta: err.meta };
  }
  return {
    code: 'INTERNAL',
    message: errorMessage(err),
    meta: err instanceof Error ? { name: err.name } : {},
  };
}

function fail(err: unknown, logger: Logger): SyncOutcome {
  const error = toSyncFailure(err);
  logger.error('sync failed', { code: error.code, message: error.message });
  return { ok: false, error };
}

async function findDanglingSelections(
  snapshot: Snapshot,
  calendarStore: CalendarStore,
  logger: Logger,
): Promise<string[]> {
  try {
    const selection = await calendarStore.loadCalendar();
    return reconcileDanglingReferences(snapshot, selection);
  } catch (err) {
    // the snapshot is already saved; a broken calendar file is reported separately
    logger.warn('could not check calendar selection', {
      error: errorMessage(err),
    });
    return [];
  }
}

/**
 * One full synchronization: fetch all three phases, reconcile, then replace
 * the stored snapshot. Anything short of a complete snapshot leaves the
 * previous one in place. Never throws; failures come back as `ok: false`.
 */
export async function runSync(deps: SyncDeps): Promise<SyncOutcome> {
  const { config, logger } = deps;
  const signal = deps.signal ?? new AbortController().signal;
  let lock: SyncLock;
  try {
    lock = await acquireSyncLock(config.dataDir, logger);
  } catch (err) {
    return fail(err, logger);
  }

  try {
    const removedTempFiles = await cleanupStaleTempFiles(config.dataDir, logger);

    const batches = await runFetchPhases(deps.source, {
      concurrency: config.concurrency,
      maxAttempts: config.maxAttempts,
      retryBaseMs: config.retryBaseMs,
      requestDelayMs: config.requestDelayMs,
      signal,
      logger,
      sleep: deps.sleep,
      now: deps.now,
    });

    const { snapshot, partialSessions, partialSpeakers } = reconcile(batches, {
      timezone: config.timezone,
      year: config.year,
      defaultDurationMinutes: config.sessionMinutes,
    });

    if (signal.aborted) throw new SyncAbortedError();
    await deps.store.saveSnapshot(snapshot);

    const report: SyncReport = {
      fetchedAt: snapshot.fetchedAt,
      counts: {
        sessions: snapshot.sessions.length,
        speakers: snapshot.speakers.length,
        tracks: snapshot.tracks.length,
        specialEvents: snapshot.specialEvents.length,
      },
      partialSessions,
      partialSpeakers,
      failures: [...batches.details.failures, ...batches.profiles.failures],
      danglingSelections: await findDanglingSelections(
        snapshot,
        deps.calendarStore,
        logger,
      ),
      removedTempFiles,
    };
    logger.info('sync complete', {
      ...report.counts,
      partialSessions: partialSessions.length,
      partialSpeakers: partialSpeakers.length,
    });
    return { ok: true, report };
  } catch (err) {
    return fail(err, logger);
  } finally {
    await lock.release();
  }
}
