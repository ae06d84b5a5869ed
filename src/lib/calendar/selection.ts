import type {
  CalendarSelection,
  Session,
  Snapshot,
} from '@/lib/schedule/types';

export function emptySelection(): CalendarSelection {
  return { version: 1, selected: [] };
}

export function isSelected(selection: CalendarSelection, sessionId: string): boolean {
  return selection.selected.includes(sessionId);
}

/** Appends `sessionId`; selecting twice is a no-op. */
export function addSession(
  selection: CalendarSelection,
  sessionId: string,
): CalendarSelection {
  if (isSelected(selection, sessionId)) return selection;
  return { ...selection, selected: [...selection.selected, sessionId] };
}

export function removeSession(
  selection: CalendarSelection,
  sessionId: string,
): CalendarSelection {
  if (!isSelected(selection, sessionId)) return selection;
  return {
    ...selection,
    selected: selection.selected.filter((id) => id !== sessionId),
  };
}

export function toggleSession(
  selection: CalendarSelection,
  sessionId: string,
): CalendarSelection {
  return isSelected(selection, sessionId)
    ? removeSession(selection, sessionId)
    : addSession(selection, sessionId);
}

/**
 * Selected ids the snapshot no longer contains, in selection order. The
 * selection itself is left alone so a later sync can bring them back.
 */
export function reconcileDanglingReferences(
  snapshot: Snapshot,
  selection: CalendarSelection,
): string[] {
  const known = new Set(snapshot.sessions.map((s) => s.id));
  const dangling = new Set<string>();
  for (const id of selection.selected) {
    if (!known.has(id)) dangling.add(id);
  }
  return [...dangling];
}

export type ResolvedSelection = {
  sessions: Session[];
  missing: string[];
};

/** Selected sessions in selection order, plus the ids that could not be found. */
export function resolveSelection(
  snapshot: Snapshot,
  selection: CalendarSelection,
): ResolvedSelection {
  const byId = new Map(snapshot.sessions.map((s) => [s.id, s]));
  const sessions: Session[] = [];
  const seen = new Set<string>();
  for (const id of selection.selected) {
    const session = byId.get(id);
    if (!session || seen.has(id)) continue;
    seen.add(id);
    sessions.push(session);
  }
  return { sessions, missing: reconcileDanglingReferences(snapshot, selection) };
}
