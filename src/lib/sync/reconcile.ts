import { DateTime } from 'luxon';

import { ReconciliationError } from '@/lib/errors';
import { parseClockTime, parseDayLabel } from '@/lib/schedule/days';
import { findIntegrityProblems } from '@/lib/schedule/integrity';
import {
  compareSessions,
  compareSpecialEvents,
  compareText,
  slotStaysWithinDay,
} from '@/lib/schedule/slot';
import { normalizeDisplayName, slugify } from '@/lib/schedule/slug';
import {
  snapshotSchema,
  type Session,
  type Snapshot,
  type SpecialEvent,
  type Speaker,
  type TimeSlot,
  type Track,
} from '@/lib/schedule/types';
import type {
  FetchedBatches,
  GridBatch,
  ItemFailure,
  RawGridSession,
  RawSpeakerRef,
} from '@/lib/sync/types';

export type ReconcileOptions = {
  timezone: string;
  // year for day headings without one; defaults to the grid fetch year
  year: number | null;
  defaultDurationMinutes: number;
};

export type PartialSession = { id: string; title: string; reason: string };
export type PartialSpeaker = { slug: string; name: string; reason: string };

export type ReconcileResult = {
  snapshot: Snapshot;
  partialSessions: PartialSession[];
  partialSpeakers: PartialSpeaker[];
};

type Interval = { day: string; start: DateTime; end: DateTime };

type MergedSession = Interval & {
  record: RawGridSession;
  trackLabels: string[];
  speakers: RawSpeakerRef[];
};

type SpeakerEntry = {
  slug: string;
  name: string;
  profileUrls: Set<string>;
  company: string | null;
  bio: string | null;
  firstSeenIn: string;
};

type DayContext = { year: number; knownDays: string[] };

function collectKnownDays(grid: GridBatch, year: number): string[] {
  const labels = new Set([
    ...grid.sessions.map((s) => s.dayLabel),
    ...grid.specialEvents.map((e) => e.dayLabel),
  ]);
  const days = new Set<string>();
  for (const label of labels) {
    const day = parseDayLabel(label, { year });
    if (day) days.add(day);
  }
  return [...days].sort(compareText);
}

function resolveInterval(
  params: {
    dayLabel: string;
    startTime: string;
    endTime: string | null;
    record: unknown;
  },
  days: DayContext,
  options: ReconcileOptions,
): Interval {
  const day = parseDayLabel(params.dayLabel, days);
  if (!day) {
    throw new ReconciliationError(
      `Unrecognized schedule day "${params.dayLabel}"`,
      params.record,
    );
  }
  const startClock = parseClockTime(params.startTime);
  if (!startClock) {
    throw new ReconciliationError(
      `Unrecognized start time "${params.startTime}"`,
      params.record,
    );
  }
  const start = DateTime.fromISO(`${day}T${startClock}`, {
    zone: options.timezone,
  });
  if (!start.isValid) {
    throw new ReconciliationError(
      `Invalid start ${day} ${startClock} in ${options.timezone}`,
      params.record,
    );
  }

  if (params.endTime === null) {
    return {
      day,
      start,
      end: start.plus({ minutes: options.defaultDurationMinutes }),
    };
  }

  const endClock = parseClockTime(params.endTime);
  const end = endClock
    ? DateTime.fromISO(`${day}T${endClock}`, { zone: options.timezone })
    : null;
  if (!end || !end.isValid || end.toMillis() <= start.toMillis()) {
    throw new ReconciliationError(
      `Invalid end time "${params.endTime}" for a slot starting at ${startClock}`,
      params.record,
    );
  }
  return { day, start, end };
}

function toSlot(interval: Interval, timezone: string, record: unknown): TimeSlot {
  const start = interval.start.toISO();
  if (!start) {
    throw new ReconciliationError('Slot start cannot be represented', record);
  }
  const slot: TimeSlot = {
    day: interval.day,
    start,
    durationMinutes: Math.round(
      interval.end.diff(interval.start, 'minutes').minutes,
    ),
    timezone,
  };
  if (!slotStaysWithinDay(slot)) {
    throw new ReconciliationError(
      `Slot starting ${start} crosses the end of ${interval.day}`,
      record,
    );
  }
  return slot;
}

function splitTrackLabels(labels: readonly string[]): string[] {
  const parts = labels
    .flatMap((label) => label.split('\t'))
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
  return [...new Set(parts)];
}

function mergeGridOccurrences(
  grid: GridBatch,
  days: DayContext,
  options: ReconcileOptions,
): MergedSession[] {
  const merged = new Map<string, MergedSession>();

  for (const record of grid.sessions) {
    if (record.title.trim().length === 0) {
      throw new ReconciliationError(
        `Session "${record.sessionId}" has no title`,
        record,
      );
    }
    const interval = resolveInterval({ ...record, record }, days, options);
    const existing = merged.get(record.sessionId);
    if (!existing) {
      merged.set(record.sessionId, {
        ...interval,
        record,
        trackLabels: [...record.trackLabels],
        speakers: [...record.speakers],
      });
      continue;
    }

    // multi-slot sessions (trainings) appear once per row on the same day
    if (existing.day !== interval.day) {
      throw new ReconciliationError(
        `Session "${record.sessionId}" appears on both ${existing.day} and ${interval.day}`,
        record,
      );
    }
    if (interval.start.toMillis() < existing.start.toMillis()) {
      existing.start = interval.start;
    }
    if (interval.end.toMillis() > existing.end.toMillis()) {
      existing.end = interval.end;
    }
    for (const label of record.trackLabels) {
      if (!existing.trackLabels.includes(label)) existing.trackLabels.push(label);
    }
    for (const speaker of record.speakers) {
      if (!existing.speakers.some((s) => s.name === speaker.name)) {
        existing.speakers.push(speaker);
      }
    }
  }

  return [...merged.values()];
}

function buildTracks(sessions: readonly MergedSession[]): Track[] {
  const labelsById = new Map<string, Set<string>>();
  for (const session of sessions) {
    for (const label of splitTrackLabels(session.trackLabels)) {
      const id = slugify(label);
      if (!id) {
        throw new ReconciliationError(`Track label "${label}" has no usable characters`, {
          sessionId: session.record.sessionId,
          label,
        });
      }
      const labels = labelsById.get(id) ?? new Set<string>();
      labels.add(label);
      labelsById.set(id, labels);
    }
  }
  return [...labelsById.entries()]
    .map(([id, labels]) => ({ id, name: [...labels].sort(compareText)[0] }))
    .sort((a, b) => compareText(a.id, b.id));
}

class SpeakerRegistry {
  private readonly entries = new Map<string, SpeakerEntry>();

  register(
    ref: RawSpeakerRef,
    sessionId: string,
    hints: { company: string | null; bio: string | null } | null = null,
  ): string {
    const name = normalizeDisplayName(ref.name);
    const slug = slugify(name);
    if (!slug) {
      throw new ReconciliationError(
        `Speaker name "${ref.name}" has no usable characters`,
        { sessionId, name: ref.name },
      );
    }

    const existing = this.entries.get(slug);
    if (existing && existing.name !== name) {
      throw new ReconciliationError(
        `Speakers "${existing.name}" and "${name}" both normalize to slug "${slug}"`,
        {
          slug,
          names: [existing.name, name],
          sessionIds: [existing.firstSeenIn, sessionId],
        },
      );
    }

    const entry = existing ?? {
      slug,
      name,
      profileUrls: new Set<string>(),
      company: null,
      bio: null,
      firstSeenIn: sessionId,
    };
    if (ref.profileUrl) entry.profileUrls.add(ref.profileUrl);
    if (hints) {
      entry.company ??= hints.company;
      entry.bio ??= hints.bio;
    }
    this.entries.set(slug, entry);
    return slug;
  }

  values(): SpeakerEntry[] {
    return [...this.entries.values()];
  }
}

function nonEmpty(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed.length > 0 ? trimmed : null;
}

function failuresByRef(failures: readonly ItemFailure[]): Map<string, ItemFailure> {
  return new Map(failures.map((failure) => [failure.ref, failure]));
}

/**
 * Stitches the grid, detail and speaker batches into one snapshot.
 *
 * References between entities are resolved by slug and id only after every
 * batch is collected. Sessions whose detail page failed keep their grid data
 * and are flagged partial; speakers whose profile failed become partial stubs.
 * Slug collisions and malformed grid data throw `ReconciliationError`.
 * The same batches always produce a deep-equal result.
 */
export function reconcile(
  batches: FetchedBatches,
  options: ReconcileOptions,
): ReconcileResult {
  const { grid, details, profiles } = batches;
  const year = options.year ?? DateTime.fromISO(grid.fetchedAt).year;
  const days: DayContext = { year, knownDays: collectKnownDays(grid, year) };

  const mergedSessions = mergeGridOccurrences(grid, days, options);
  const tracks = buildTracks(mergedSessions);

  const detailById = new Map(details.records.map((d) => [d.sessionId, d]));
  const detailFailures = failuresByRef(details.failures);
  const profileByUrl = new Map(profiles.records.map((p) => [p.profileUrl, p]));
  const profileFailures = failuresByRef(profiles.failures);

  const registry = new SpeakerRegistry();
  const sessions: Session[] = [];
  const partialSessions: PartialSession[] = [];

  for (const merged of mergedSessions) {
    const { record } = merged;
    const detail = detailById.get(record.sessionId);

    const speakerSlugs = merged.speakers.map((ref) =>
      registry.register(ref, record.sessionId),
    );
    for (const ref of detail?.speakers ?? []) {
      speakerSlugs.push(registry.register(ref, record.sessionId, ref));
    }

    sessions.push({
      id: record.sessionId,
      title: record.title.trim(),
      abstract: nonEmpty(detail?.abstract),
      slot: toSlot(merged, options.timezone, record),
      room: record.room.trim(),
      language: nonEmpty(detail?.language),
      level: nonEmpty(detail?.level),
      isKeynote: record.isKeynote,
      speakers: [...new Set(speakerSlugs)],
      tracks: [
        ...new Set(splitTrackLabels(merged.trackLabels).map((l) => slugify(l))),
      ].sort(compareText),
      partial: detail === undefined,
    });

    if (!detail) {
      partialSessions.push({
        id: record.sessionId,
        title: record.title.trim(),
        reason:
          detailFailures.get(record.url)?.message ??
          'session page was not fetched',
      });
    }
  }

  const speakers: Speaker[] = [];
  const partialSpeakers: PartialSpeaker[] = [];
  for (const entry of registry.values()) {
    const urls = [...entry.profileUrls].sort(compareText);
    const profileUrl = urls.find((url) => profileByUrl.has(url));
    const profile = profileUrl ? profileByUrl.get(profileUrl) : undefined;

    if (profile) {
      speakers.push({
        slug: entry.slug,
        name: entry.name,
        bio: nonEmpty(profile.bio) ?? nonEmpty(entry.bio),
        company: nonEmpty(entry.company) ?? nonEmpty(profile.company),
        country: nonEmpty(profile.country),
        photoUrl: nonEmpty(profile.photoUrl),
        links: profile.links.map((link) => ({ ...link })),
        partial: false,
      });
      continue;
    }

    speakers.push({
      slug: entry.slug,
      name: entry.name,
      bio: null,
      company: null,
      country: null,
      photoUrl: null,
      links: [],
      partial: true,
    });
    const failure = urls
      .map((url) => profileFailures.get(url))
      .find((f) => f !== undefined);
    partialSpeakers.push({
      slug: entry.slug,
      name: entry.name,
      reason:
        failure?.message ??
        (urls.length === 0 ? 'no profile link on the schedule' : 'profile page was not fetched'),
    });
  }

  const specialEvents = new Map<string, SpecialEvent>();
  for (const raw of grid.specialEvents) {
    const name = raw.name.trim();
    if (!name) continue;
    const slot = toSlot(
      resolveInterval({ ...raw, record: raw }, days, options),
      options.timezone,
      raw,
    );
    specialEvents.set(`${slot.start}|${name}`, { name, slot });
  }

  const candidate: Snapshot = {
    version: 1,
    fetchedAt: grid.fetchedAt,
    tracks,
    speakers: speakers.sort((a, b) => compareText(a.slug, b.slug)),
    sessions: sessions.sort(compareSessions),
    specialEvents: [...specialEvents.values()].sort(compareSpecialEvents),
  };

  const parsed = snapshotSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ReconciliationError('Reconciled snapshot failed validation', {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
  }
  const [problem] = findIntegrityProblems(parsed.data);
  if (problem) throw new ReconciliationError(problem.message, problem.record);

  return {
    snapshot: parsed.data,
    partialSessions: partialSessions.sort((a, b) => compareText(a.id, b.id)),
    partialSpeakers: partialSpeakers.sort((a, b) =>
      compareText(a.slug, b.slug),
    ),
  };
}
