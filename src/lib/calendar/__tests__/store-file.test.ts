import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { FileCalendarStore } from '@/lib/calendar/store-file';
import { addSession } from '@/lib/calendar/selection';
import { StorageError } from '@/lib/errors';

describe('FileCalendarStore', () => {
  let dataDir: string;
  let store: FileCalendarStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'confsched-calendar-'));
    store = new FileCalendarStore(path.join(dataDir, 'nested'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('starts with an empty selection', async () => {
    await expect(store.loadCalendar()).resolves.toEqual({ version: 1, selected: [] });
  });

  it('persists the selection as formatted JSON', async () => {
    await store.saveCalendar({ version: 1, selected: ['S-1', 'S-404'] });
    expect(await readFile(store.filePath, 'utf8')).toBe(
      '{\n  "version": 1,\n  "selected": [\n    "S-1",\n    "S-404"\n  ]\n}\n',
    );
    await expect(store.loadCalendar()).resolves.toEqual({
      version: 1,
      selected: ['S-1', 'S-404'],
    });
    expect(await readdir(path.join(dataDir, 'nested'))).toEqual(['my-calendar.json']);
  });

  it('serializes concurrent saves in call order', async () => {
    const base = { version: 1 as const, selected: [] };
    await Promise.all([
      store.saveCalendar(addSession(base, 'first')),
      store.saveCalendar(addSession(base, 'second')),
      store.saveCalendar(addSession(base, 'third')),
    ]);
    await expect(store.loadCalendar()).resolves.toEqual({
      version: 1,
      selected: ['third'],
    });
  });

  it('refuses to silently reset a corrupt file', async () => {
    await store.saveCalendar({ version: 1, selected: ['S-1'] });
    await writeFile(store.filePath, '{"version": 2}', 'utf8');
    await expect(store.loadCalendar()).rejects.toBeInstanceOf(StorageError);
    expect(await readFile(store.filePath, 'utf8')).toBe('{"version": 2}');
  });

  it('drops duplicate ids when reading', async () => {
    await store.saveCalendar({ version: 1, selected: ['S-1'] });
    await writeFile(
      store.filePath,
      JSON.stringify({ version: 1, selected: ['S-1', 'S-2', 'S-1'] }),
      'utf8',
    );
    await expect(store.loadCalendar()).resolves.toEqual({
      version: 1,
      selected: ['S-1', 'S-2'],
    });
  });
});
