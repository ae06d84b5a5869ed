import { slotStaysWithinDay } from '@/lib/schedule/slot';
import type { Snapshot } from '@/lib/schedule/types';

export type IntegrityProblem = {
  message: string;
  record: Record<string, unknown>;
};

function findDuplicates(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return [...duplicates];
}

/**
 * Checks the invariants every snapshot must hold before it is persisted or
 * handed to readers: unique keys, resolvable references, single-day slots.
 */
export function findIntegrityProblems(snapshot: Snapshot): IntegrityProblem[] {
  const problems: IntegrityProblem[] = [];

  for (const id of findDuplicates(snapshot.tracks.map((t) => t.id))) {
    problems.push({ message: `Duplicate track id "${id}"`, record: { id } });
  }
  for (const slug of findDuplicates(snapshot.speakers.map((s) => s.slug))) {
    problems.push({
      message: `Duplicate speaker slug "${slug}"`,
      record: { slug },
    });
  }
  for (const id of findDuplicates(snapshot.sessions.map((s) => s.id))) {
    problems.push({ message: `Duplicate session id "${id}"`, record: { id } });
  }

  const trackIds = new Set(snapshot.tracks.map((t) => t.id));
  const speakerSlugs = new Set(snapshot.speakers.map((s) => s.slug));

  for (const session of snapshot.sessions) {
    for (const slug of session.speakers) {
      if (!speakerSlugs.has(slug)) {
        problems.push({
          message: `Session "${session.id}" references unknown speaker "${slug}"`,
          record: { sessionId: session.id, speaker: slug },
        });
      }
    }
    for (const trackId of session.tracks) {
      if (!trackIds.has(trackId)) {
        problems.push({
          message: `Session "${session.id}" references unknown track "${trackId}"`,
          record: { sessionId: session.id, track: trackId },
        });
      }
    }
    if (!slotStaysWithinDay(session.slot)) {
      problems.push({
        message: `Session "${session.id}" slot does not fit within ${session.slot.day}`,
        record: { sessionId: session.id, slot: session.slot },
      });
    }
  }

  for (const event of snapshot.specialEvents) {
    if (!slotStaysWithinDay(event.slot)) {
      problems.push({
        message: `Event "${event.name}" slot does not fit within ${event.slot.day}`,
        record: { name: event.name, slot: event.slot },
      });
    }
  }

  return problems;
}
