import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import ICAL from 'ical.js';
import { afterEach, beforeAll, beforeEach, describe, it, expect } from 'vitest';
import {
  CALENDAR_EXPORT_FILENAME,
  exportCalendar,
  writeCalendarExport,
} from '@/lib/export/calendar';
import { writeSnapshotJson } from '@/lib/export/snapshot-json';
import { loadBundledSnapshot } from '@/lib/schedule/fallback';
import type { Snapshot } from '@/lib/schedule/types';
import { makeSession, makeSlot, makeSnapshot } from '@/test/factories';

function parseEvents(ics: string) {
  return ICAL.Component.fromString(ics)
    .getAllSubcomponents('vevent')
    .map((component) => new ICAL.Event(component));
}

describe('exportCalendar', () => {
  let snapshot: Snapshot;

  beforeAll(async () => {
    snapshot = await loadBundledSnapshot();
  });

  it('exports the selected sessions in selection order', () => {
    const result = exportCalendar(
      { version: 1, selected: ['1301', '1201'] },
      snapshot,
    );
    const events = parseEvents(result.ics);

    expect(result.eventCount).toBe(2);
    expect(result.missing).toEqual([]);
    expect(events.map((e) => e.uid)).toEqual(['1301@confsched', '1201@confsched']);
    expect(events[1]?.summary).toBe('Opening keynote: Ten years of shipping on Fridays');
    expect(events[1]?.location).toBe('Salon A');
    expect(events[1]?.startDate.toJSDate().toISOString()).toBe(
      '2026-02-25T14:00:00.000Z',
    );
    expect(events[1]?.endDate.toJSDate().toISOString()).toBe(
      '2026-02-25T15:00:00.000Z',
    );
  });

  it('keeps both sides of a conflict and cross-references them', () => {
    const result = exportCalendar(
      { version: 1, selected: ['1202', '1203'] },
      snapshot,
    );
    const [first, second] = parseEvents(result.ics);

    expect(first?.description).toBe(
      [
        'Speakers: Amélie Côté (Northwind Labs)',
        'Tracks: Architecture',
        'Conflicts with: Modern PHP testing with less mocking (2026-02-25 10:15-11:00)',
        '',
        'A practical path from CRUD tables to an event log, with the migration steps that worked and the ones that did not.',
      ].join('\n'),
    );
    expect(second?.description).toContain(
      'Conflicts with: Event sourcing without the tears (2026-02-25 10:15-11:00)',
    );
  });

  it('skips selected ids that are no longer in the schedule', () => {
    const result = exportCalendar(
      { version: 1, selected: ['S-404', '1202'] },
      snapshot,
    );
    expect(result.eventCount).toBe(1);
    expect(result.missing).toEqual(['S-404']);
    expect(parseEvents(result.ics).map((e) => e.uid)).toEqual(['1202@confsched']);
  });

  it('keeps every line within 75 octets', () => {
    const result = exportCalendar(
      { version: 1, selected: ['1201', '1202', '1203', '1204'] },
      snapshot,
    );
    for (const line of result.ics.split('\r\n')) {
      expect(Buffer.byteLength(line, 'utf8')).toBeLessThanOrEqual(75);
    }
  });

  it('uses the sync time as DTSTAMP and omits empty fields', () => {
    const bare = makeSnapshot({
      sessions: [
        makeSession({ id: 'S-1', room: null, slot: makeSlot('2026-02-26', '09:30') }),
      ],
    });
    const { ics } = exportCalendar({ version: 1, selected: ['S-1'] }, bare, {
      calendarName: 'Test calendar',
    });

    expect(ics).toContain('X-WR-CALNAME:Test calendar\r\n');
    expect(ics).toContain('DTSTAMP:20260120T153000Z\r\n');
    expect(ics).toContain('DTSTART:20260226T143000Z\r\n');
    expect(ics).toContain('DTEND:20260226T151500Z\r\n');
    expect(ics).not.toContain('LOCATION');
    expect(ics).not.toContain('DESCRIPTION');
  });
});

describe('export files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'confsched-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the calendar into the export directory', async () => {
    const filePath = await writeCalendarExport(path.join(dir, 'out'), 'BEGIN:VCALENDAR\r\n');
    expect(filePath).toBe(path.join(dir, 'out', CALENDAR_EXPORT_FILENAME));
    expect(await readFile(filePath, 'utf8')).toBe('BEGIN:VCALENDAR\r\n');
  });

  it('writes a snapshot that reads back unchanged', async () => {
    const snapshot = await loadBundledSnapshot();
    const filePath = path.join(dir, 'schedule.json');
    await writeSnapshotJson(snapshot, filePath);

    const written = await readFile(filePath, 'utf8');
    expect(written.endsWith('}\n')).toBe(true);
    expect(JSON.parse(written)).toEqual(snapshot);
    await expect(loadBundledSnapshot(filePath)).resolves.toEqual(snapshot);
  });
});
