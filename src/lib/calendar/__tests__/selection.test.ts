import { describe, it, expect } from 'vitest';
import {
  addSession,
  emptySelection,
  isSelected,
  reconcileDanglingReferences,
  removeSession,
  resolveSelection,
  toggleSession,
} from '@/lib/calendar/selection';
import { makeSession, makeSnapshot } from '@/test/factories';

describe('selection helpers', () => {
  it('adds each session once, in order', () => {
    let selection = emptySelection();
    selection = addSession(selection, 'b');
    selection = addSession(selection, 'a');
    selection = addSession(selection, 'b');
    expect(selection).toEqual({ version: 1, selected: ['b', 'a'] });
  });

  it('removes and toggles', () => {
    const selection = { version: 1 as const, selected: ['a', 'b'] };
    expect(removeSession(selection, 'a').selected).toEqual(['b']);
    expect(removeSession(selection, 'z')).toBe(selection);
    expect(toggleSession(selection, 'b').selected).toEqual(['a']);
    expect(toggleSession(selection, 'c').selected).toEqual(['a', 'b', 'c']);
    expect(isSelected(selection, 'a')).toBe(true);
  });
});

describe('reconcileDanglingReferences', () => {
  it('lists selected ids missing from the snapshot, in selection order', () => {
    const snapshot = makeSnapshot({
      sessions: [makeSession({ id: 'S-1' }), makeSession({ id: 'S-2' })],
    });
    const selection = { version: 1 as const, selected: ['S-404', 'S-1', 'S-9', 'S-404'] };
    expect(reconcileDanglingReferences(snapshot, selection)).toEqual(['S-404', 'S-9']);
    expect(selection.selected).toEqual(['S-404', 'S-1', 'S-9', 'S-404']);
  });
});

describe('resolveSelection', () => {
  it('returns the selected sessions with the missing ids', () => {
    const snapshot = makeSnapshot({
      sessions: [makeSession({ id: 'S-1' }), makeSession({ id: 'S-2' })],
    });
    const resolved = resolveSelection(snapshot, {
      version: 1,
      selected: ['S-2', 'S-404', 'S-1'],
    });
    expect(resolved.sessions.map((s) => s.id)).toEqual(['S-2', 'S-1']);
    expect(resolved.missing).toEqual(['S-404']);
  });
});
