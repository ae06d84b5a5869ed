import path from 'node:path';

import { DateTime } from 'luxon';

import { resolveSelection } from '@/lib/calendar/selection';
import { conflictsBySession, findConflicts } from '@/lib/conflicts/find';
import { writeFileAtomic } from '@/lib/fs/write-atomic';
import { generateIcs, type IcsEvent } from '@/lib/ics/generate';
import { formatSlotRange, slotEnd, slotStart } from '@/lib/schedule/slot';
import type {
  CalendarSelection,
  Session,
  Snapshot,
  Speaker,
  Track,
} from '@/lib/schedule/types';

export const CALENDAR_EXPORT_FILENAME = 'confsched.ics';
export const UID_DOMAIN = 'confsched';

export type ExportOptions = {
  calendarName?: string;
};

export type CalendarExport = {
  ics: string;
  eventCount: number;
  // selected ids with no session in the snapshot
  missing: string[];
};

function describeSpeaker(speaker: Speaker): string {
  return speaker.company ? `${speaker.name} (${speaker.company})` : speaker.name;
}

function buildDescription(
  session: Session,
  speakers: ReadonlyMap<string, Speaker>,
  tracks: ReadonlyMap<string, Track>,
  conflicts: readonly Session[],
): string {
  const lines: string[] = [];

  const names = session.speakers.map((slug) => {
    const speaker = speakers.get(slug);
    return speaker ? describeSpeaker(speaker) : slug;
  });
  if (names.length > 0) lines.push(`Speakers: ${names.join(', ')}`);

  const trackNames = session.tracks.map((id) => tracks.get(id)?.name ?? id);
  if (trackNames.length > 0) lines.push(`Tracks: ${trackNames.join(', ')}`);

  for (const other of conflicts) {
    lines.push(`Conflicts with: ${other.title} (${formatSlotRange(other.slot)})`);
  }

  if (session.abstract) {
    if (lines.length > 0) lines.push('');
    lines.push(session.abstract);
  }
  return lines.join('\n');
}

/**
 * Builds the iCalendar document for the selected sessions. Overlapping
 * sessions are all exported; each one names the others in its description.
 */
export function exportCalendar(
  selection: CalendarSelection,
  snapshot: Snapshot,
  options: ExportOptions = {},
): CalendarExport {
  const { sessions, missing } = resolveSelection(snapshot, selection);
  const conflicts = conflictsBySession(findConflicts(sessions));
  const speakers = new Map(snapshot.speakers.map((s) => [s.slug, s]));
  const tracks = new Map(snapshot.tracks.map((t) => [t.id, t]));
  const stamp = DateTime.fromISO(snapshot.fetchedAt, { zone: 'utc' });

  const events: IcsEvent[] = sessions.map((session) => ({
    uid: `${session.id}@${UID_DOMAIN}`,
    stamp,
    start: slotStart(session.slot),
    end: slotEnd(session.slot),
    summary: session.title,
    location: session.room || null,
    description:
      buildDescription(
        session,
        speakers,
        tracks,
        conflicts.get(session.id) ?? [],
      ) || null,
    categories: session.tracks.map((id) => tracks.get(id)?.name ?? id),
  }));

  return {
    ics: generateIcs({
      events,
      calendarName: options.calendarName ?? 'My conference schedule',
    }),
    eventCount: events.length,
    missing,
  };
}

export async function writeCalendarExport(
  exportDir: string,
  ics: string,
): Promise<string> {
  const filePath = path.join(exportDir, CALENDAR_EXPORT_FILENAME);
  await writeFileAtomic(filePath, ics);
  return filePath;
}
