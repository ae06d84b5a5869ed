import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { USAGE, runCommand, type CommandContext } from '@/lib/cli/commands';
import { FileCalendarStore } from '@/lib/calendar/store-file';
import { getConfig } from '@/lib/env';
import { SqliteScheduleStore } from '@/lib/schedule/store-sqlite';
import type { RawGridContent } from '@/lib/sync/types';
import {
  FakeScheduleSource,
  detail,
  gridSession,
  recordingLogger,
} from '@/test/factories';

describe('runCommand', () => {
  let dataDir: string;
  let lines: string[];
  let grid: RawGridContent;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'confsched-cli-'));
    lines = [];
    grid = {
      sessions: [gridSession({ sessionId: '100', title: 'Parsing logs at scale' })],
      specialEvents: [],
    };
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  function context(): CommandContext {
    const config = getConfig({
      CONFSCHED_DATA_DIR: dataDir,
      CONFSCHED_EXPORT_DIR: path.join(dataDir, 'out'),
      CONFSCHED_REQUEST_DELAY_MS: '0',
      CONFSCHED_RETRY_BASE_MS: '0',
    });
    const logger = recordingLogger();
    return {
      config,
      logger,
      store: new SqliteScheduleStore(config.dataDir, logger),
      calendarStore: new FileCalendarStore(config.dataDir),
      createSource: () => new FakeScheduleSource({ grid, details: [detail('100')] }),
      out: (line) => lines.push(line),
    };
  }

  function run(...argv: string[]): Promise<number> {
    return runCommand(argv, context());
  }

  it('prints usage without a command', async () => {
    await expect(run()).resolves.toBe(2);
    expect(lines).toEqual(USAGE);
  });

  it('prints usage on request', async () => {
    await expect(run('--help')).resolves.toBe(0);
    expect(lines).toEqual(USAGE);
  });

  it('rejects unknown commands and options', async () => {
    await expect(run('frobnicate')).resolves.toBe(2);
    expect(lines[0]).toBe('unknown command "frobnicate"');

    lines = [];
    await expect(run('status', '--verbose')).resolves.toBe(2);
    expect(lines.slice(1)).toEqual(USAGE);
  });

  it('reports the bundled schedule before the first sync', async () => {
    await expect(run('status')).resolves.toBe(0);
    expect(lines).toEqual([
      'Schedule: bundled data (run "confsched sync" to refresh)',
      '  8 sessions, 5 speakers, 4 tracks',
      'Calendar: 0 sessions selected',
    ]);
  });

  it('selects and deselects sessions', async () => {
    await expect(run('select', '1202')).resolves.toBe(0);
    await expect(run('select', '1202')).resolves.toBe(0);
    await expect(run('select', 'S-404')).resolves.toBe(0);
    await expect(run('deselect', 'S-404')).resolves.toBe(0);
    await expect(run('deselect', 'S-404')).resolves.toBe(0);
    await expect(run('select')).resolves.toBe(2);

    expect(lines).toEqual([
      'Added 1202: Event sourcing without the tears (2026-02-25 10:15-11:00)',
      '1202 is already in your calendar',
      'Added S-404 (not in the current schedule)',
      'Removed S-404',
      'S-404 is not in your calendar',
      'usage: confsched select <session-id>',
    ]);
    const saved = JSON.parse(
      await readFile(path.join(dataDir, 'my-calendar.json'), 'utf8'),
    );
    expect(saved).toEqual({ version: 1, selected: ['1202'] });
  });

  it('lists the calendar with ratings and conflicts', async () => {
    await writeFile(
      path.join(dataDir, 'speaker-ratings.json'),
      JSON.stringify({ 'amelie-cote': { tier: 'S' } }),
      'utf8',
    );
    await writeFile(
      path.join(dataDir, 'my-calendar.json'),
      JSON.stringify({ version: 1, selected: ['1202', '1203', 'S-404'] }),
      'utf8',
    );

    await expect(run('calendar')).resolves.toBe(0);
    expect(lines).toEqual([
      '2026-02-25 10:15-11:00  1202  Event sourcing without the tears [Salon B]',
      '    Amélie Côté [S ★★★★★ Exceptional]',
      '    conflicts with 1203: Modern PHP testing with less mocking',
      '2026-02-25 10:15-11:00  1203  Modern PHP testing with less mocking [Salon C]',
      '    Bruno Alves',
      '    conflicts with 1202: Event sourcing without the tears',
      'No longer in the schedule: S-404',
    ]);
  });

  it('says so when the calendar is empty', async () => {
    await expect(run('calendar')).resolves.toBe(0);
    expect(lines).toEqual(['Your calendar is empty.']);
  });

  it('exports the calendar to the export directory', async () => {
    await run('select', '1201');
    await run('select', 'S-404');
    lines = [];

    await expect(run('export')).resolves.toBe(0);
    const filePath = path.join(dataDir, 'out', 'confsched.ics');
    expect(lines).toEqual([
      `Wrote 1 events to ${filePath}`,
      'Skipped, no longer in the schedule: S-404',
    ]);
    expect(await readFile(filePath, 'utf8')).toContain('UID:1201@confsched\r\n');
  });

  it('writes the schedule as JSON', async () => {
    const target = path.join(dataDir, 'schedule.json');
    await expect(run('export-json', target)).resolves.toBe(0);
    expect(lines).toEqual([`Wrote 8 sessions to ${target}`]);

    const written = JSON.parse(await readFile(target, 'utf8'));
    expect(written.sessions).toHaveLength(8);
  });

  it('syncs and then reports the synced schedule', async () => {
    await expect(run('sync')).resolves.toBe(0);
    expect(lines[0]).toMatch(/^Synced schedule fetched at \d{4}-\d{2}-\d{2}T/);
    expect(lines[1]).toBe('  1 sessions, 0 speakers, 0 tracks, 0 other events');

    lines = [];
    await expect(run('status')).resolves.toBe(0);
    expect(lines[0]).toMatch(/^Schedule: synced data \(last sync \d{4}-\d{2}-\d{2}T/);
    expect(lines.slice(1)).toEqual([
      '  1 sessions, 0 speakers, 0 tracks',
      'Calendar: 0 sessions selected',
    ]);
  });

  it('reports a failed sync and keeps the bundled schedule', async () => {
    grid = { sessions: [], specialEvents: [] };
    await expect(run('sync')).resolves.toBe(1);
    expect(lines[0]).toMatch(/^Sync failed \(RECONCILIATION\): /);
    expect(lines[1]).toBe('The previously stored schedule was left unchanged.');

    lines = [];
    await run('status');
    expect(lines[0]).toBe('Schedule: bundled data (run "confsched sync" to refresh)');
  });

  it('reports storage errors instead of throwing', async () => {
    await writeFile(path.join(dataDir, 'my-calendar.json'), 'not json', 'utf8');
    await expect(run('status')).resolves.toBe(1);
    expect(lines).toEqual([
      `error (STORAGE): Invalid calendar file format at ${path.join(dataDir, 'my-calendar.json')}`,
    ]);
  });
});
