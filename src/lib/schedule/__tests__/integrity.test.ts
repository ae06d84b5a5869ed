import { describe, it, expect } from 'vitest';
import { findIntegrityProblems } from '@/lib/schedule/integrity';
import {
  makeSession,
  makeSlot,
  makeSnapshot,
  makeSpeaker,
} from '@/test/factories';

describe('findIntegrityProblems', () => {
  it('accepts a consistent snapshot', () => {
    const snapshot = makeSnapshot({
      tracks: [{ id: 'php', name: 'PHP' }],
      speakers: [makeSpeaker('jane-doe', 'Jane Doe')],
      sessions: [makeSession({ id: '1', speakers: ['jane-doe'], tracks: ['php'] })],
    });
    expect(findIntegrityProblems(snapshot)).toEqual([]);
  });

  it('reports unresolved references and duplicate ids', () => {
    const snapshot = makeSnapshot({
      sessions: [
        makeSession({ id: '1', speakers: ['ghost'] }),
        makeSession({ id: '1', tracks: ['nowhere'] }),
      ],
    });
    expect(findIntegrityProblems(snapshot).map((p) => p.message)).toEqual([
      'Duplicate session id "1"',
      'Session "1" references unknown speaker "ghost"',
      'Session "1" references unknown track "nowhere"',
    ]);
  });

  it('reports slots that run past midnight', () => {
    const snapshot = makeSnapshot({
      specialEvents: [{ name: 'Party', slot: makeSlot('2026-02-25', '23:00', 120) }],
    });
    expect(findIntegrityProblems(snapshot)).toEqual([
      {
        message: 'Event "Party" slot does not fit within 2026-02-25',
        record: { name: 'Party', slot: makeSlot('2026-02-25', '23:00', 120) },
      },
    ]);
  });
});
