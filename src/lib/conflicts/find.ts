import { compareSessions, slotBounds } from '@/lib/schedule/slot';
import type { Session } from '@/lib/schedule/types';

export type ConflictPair = {
  a: Session;
  b: Session;
};

function overlaps(a: Session, b: Session): boolean {
  const first = slotBounds(a.slot);
  const second = slotBounds(b.slot);
  return first.startMs < second.endMs && second.startMs < first.endMs;
}

/**
 * Every pair of sessions whose slots overlap. Touching slots (one ends as the
 * other starts) do not conflict. Each pair is reported once with `a` ordered
 * before `b`; pairs come back sorted by `a`, then `b`.
 */
export function findConflicts(sessions: readonly Session[]): ConflictPair[] {
  const unique = new Map<string, Session>();
  for (const session of sessions) {
    if (!unique.has(session.id)) unique.set(session.id, session);
  }
  const ordered = [...unique.values()].sort(compareSessions);

  const pairs: ConflictPair[] = [];
  for (let i = 0; i < ordered.length; i += 1) {
    for (let j = i + 1; j < ordered.length; j += 1) {
      if (overlaps(ordered[i], ordered[j])) {
        pairs.push({ a: ordered[i], b: ordered[j] });
      }
    }
  }
  return pairs;
}

/** Session id to the other sessions it conflicts with, in schedule order. */
export function conflictsBySession(
  pairs: readonly ConflictPair[],
): Map<string, Session[]> {
  const index = new Map<string, Session[]>();
  const add = (id: string, other: Session) => {
    const list = index.get(id) ?? [];
    list.push(other);
    index.set(id, list);
  };
  for (const { a, b } of pairs) {
    add(a.id, b);
    add(b.id, a);
  }
  for (const list of index.values()) {
    list.sort(compareSessions);
  }
  return index;
}
