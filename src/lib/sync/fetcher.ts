import { FetchError, ReconciliationError, errorMessage } from '@/lib/errors';
import type { Logger } from '@/lib/log';
import { mapWithConcurrency } from '@/lib/sync/pool';
import { sleep, withRetry, type Sleep } from '@/lib/sync/retry';
import type {
  DetailBatch,
  FetchPhase,
  FetchedBatches,
  GridBatch,
  ItemBatch,
  ItemFailure,
  ProfileBatch,
  RawSessionDetail,
  ScheduleSource,
  SessionRef,
} from '@/lib/sync/types';

const PROGRESS_LOG_EVERY = 20;

export type FetchPhaseOptions = {
  concurrency: number;
  maxAttempts: number;
  retryBaseMs: number;
  requestDelayMs: number;
  signal: AbortSignal;
  logger: Logger;
  sleep?: Sleep;
  now?: () => Date;
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function timestamp(options: FetchPhaseOptions): string {
  return (options.now?.() ?? new Date()).toISOString();
}

export async function fetchGridPhase(
  source: ScheduleSource,
  options: FetchPhaseOptions,
): Promise<GridBatch> {
  options.logger.info('phase 1: loading schedule grid');
  const result = await withRetry(() => source.fetchGrid(options.signal), {
    maxAttempts: options.maxAttempts,
    baseDelayMs: options.retryBaseMs,
    signal: options.signal,
    sleep: options.sleep,
    onRetry: ({ attempt, delayMs, error }) =>
      options.logger.warn('grid fetch failed, retrying', {
        attempt,
        delayMs,
        error: errorMessage(error),
      }),
  });
  if (!result.ok) {
    if (result.error instanceof FetchError) throw result.error;
    throw new FetchError(
      `Schedule grid could not be read: ${errorMessage(result.error)}`,
      false,
    );
  }

  const content = result.value;
  if (content.sessions.length === 0) {
    throw new ReconciliationError(
      'Schedule grid contains no sessions; the page layout may have changed.',
      { specialEvents: content.specialEvents.length },
    );
  }

  options.logger.info('phase 1: grid loaded', {
    occurrences: content.sessions.length,
    specialEvents: content.specialEvents.length,
  });
  return deepFreeze<GridBatch>({
    phase: 'grid',
    fetchedAt: timestamp(options),
    sessions: content.sessions,
    specialEvents: content.specialEvents,
  });
}

async function fetchItems<TPhase extends FetchPhase, TRef, TRecord>(
  phase: TPhase,
  refs: readonly TRef[],
  describe: (ref: TRef) => string,
  fetchOne: (ref: TRef, signal: AbortSignal) => Promise<TRecord>,
  options: FetchPhaseOptions,
): Promise<ItemBatch<TPhase, TRecord>> {
  const wait = options.sleep ?? sleep;
  let completed = 0;

  const outcomes = await mapWithConcurrency(
    refs,
    options.concurrency,
    async (ref) => {
      const result = await withRetry(() => fetchOne(ref, options.signal), {
        maxAttempts: options.maxAttempts,
        baseDelayMs: options.retryBaseMs,
        signal: options.signal,
        sleep: wait,
        onRetry: ({ attempt, delayMs, error }) =>
          options.logger.debug(`${phase} fetch failed, retrying`, {
            ref: describe(ref),
            attempt,
            delayMs,
            error: errorMessage(error),
          }),
      });
      await wait(options.requestDelayMs, options.signal);

      completed += 1;
      if (completed === 1 || completed % PROGRESS_LOG_EVERY === 0) {
        options.logger.info(`${phase} progress`, {
          completed,
          total: refs.length,
        });
      }
      return result;
    },
    options.signal,
  );

  const records: TRecord[] = [];
  const failures: ItemFailure[] = [];
  outcomes.forEach((outcome, index) => {
    if (outcome.ok) {
      records.push(outcome.value);
      return;
    }
    const failure: ItemFailure = {
      phase,
      ref: describe(refs[index]),
      attempts: outcome.attempts,
      message: errorMessage(outcome.error),
    };
    options.logger.warn(`${phase} item failed`, failure);
    failures.push(failure);
  });

  return deepFreeze<ItemBatch<TPhase, TRecord>>({
    phase,
    fetchedAt: timestamp(options),
    records,
    failures,
  });
}

export function collectSessionRefs(grid: GridBatch): SessionRef[] {
  const refs = new Map<string, SessionRef>();
  for (const session of grid.sessions) {
    if (!refs.has(session.sessionId)) {
      refs.set(session.sessionId, {
        sessionId: session.sessionId,
        url: session.url,
      });
    }
  }
  return [...refs.values()];
}

/** Distinct speaker profile URLs named in the grid or on session pages, sorted. */
export function collectSpeakerRefs(
  grid: GridBatch,
  details: readonly RawSessionDetail[],
): string[] {
  const urls = new Set<string>();
  for (const session of grid.sessions) {
    for (const speaker of session.speakers) {
      if (speaker.profileUrl) urls.add(speaker.profileUrl);
    }
  }
  for (const detail of details) {
    for (const speaker of detail.speakers) {
      if (speaker.profileUrl) urls.add(speaker.profileUrl);
    }
  }
  return [...urls].sort();
}

export async function fetchDetailPhase(
  source: ScheduleSource,
  grid: GridBatch,
  options: FetchPhaseOptions,
): Promise<DetailBatch> {
  const refs = collectSessionRefs(grid);
  options.logger.info('phase 2: fetching session details', {
    total: refs.length,
  });
  const batch = await fetchItems(
    'detail',
    refs,
    (ref) => ref.url,
    (ref, signal) => source.fetchSessionDetail(ref, signal),
    options,
  );
  options.logger.info('phase 2: done', {
    fetched: batch.records.length,
    failed: batch.failures.length,
  });
  return batch;
}

export async function fetchSpeakerPhase(
  source: ScheduleSource,
  grid: GridBatch,
  details: DetailBatch,
  options: FetchPhaseOptions,
): Promise<ProfileBatch> {
  const refs = collectSpeakerRefs(grid, details.records);
  options.logger.info('phase 3: fetching speaker profiles', {
    total: refs.length,
  });
  const batch = await fetchItems(
    'speaker',
    refs,
    (url) => url,
    (url, signal) => source.fetchSpeakerProfile(url, signal),
    options,
  );
  options.logger.info('phase 3: done', {
    fetched: batch.records.length,
    failed: batch.failures.length,
  });
  return batch;
}

/**
 * Runs grid, detail and speaker phases strictly in order. Each phase only
 * starts after every item of the previous one is terminal.
 */
export async function runFetchPhases(
  source: ScheduleSource,
  options: FetchPhaseOptions,
): Promise<FetchedBatches> {
  const grid = await fetchGridPhase(source, options);
  const details = await fetchDetailPhase(source, grid, options);
  const profiles = await fetchSpeakerPhase(source, grid, details, options);
  return { grid, details, profiles };
}
