import { mkdtemp, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SqliteScheduleStore } from '@/lib/schedule/store-sqlite';
import { loadBundledSnapshot } from '@/lib/schedule/fallback';
import { SnapshotNotFoundError, StorageError } from '@/lib/errors';
import {
  makeSession,
  makeSnapshot,
  makeSpeaker,
  recordingLogger,
} from '@/test/factories';

describe('SqliteScheduleStore', () => {
  let dataDir: string;
  let store: SqliteScheduleStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'confsched-store-'));
    store = new SqliteScheduleStore(dataDir, recordingLogger());
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('reports a missing snapshot before the first sync', async () => {
    await expect(store.loadSnapshot()).rejects.toBeInstanceOf(SnapshotNotFoundError);
    await expect(store.lastSyncedAt()).resolves.toBeNull();
  });

  it('round-trips a full snapshot', async () => {
    const snapshot = await loadBundledSnapshot();
    await store.saveSnapshot(snapshot);

    await expect(store.loadSnapshot()).resolves.toEqual(snapshot);
    await expect(store.lastSyncedAt()).resolves.toBe(snapshot.fetchedAt);
    expect(await readdir(dataDir)).toEqual(['schedule.db']);
  });

  it('replaces the previous snapshot as a whole', async () => {
    await store.saveSnapshot(await loadBundledSnapshot());
    const next = makeSnapshot({
      fetchedAt: '2026-02-01T08:00:00.000Z',
      speakers: [makeSpeaker('jane-doe', 'Jane Doe')],
      sessions: [makeSession({ id: '1', speakers: ['jane-doe'] })],
    });
    await store.saveSnapshot(next);
    await expect(store.loadSnapshot()).resolves.toEqual(next);
  });

  it('keeps the previous snapshot when a save fails', async () => {
    const previous = await loadBundledSnapshot();
    await store.saveSnapshot(previous);

    const broken = makeSnapshot({
      sessions: [makeSession({ id: '1', speakers: ['ghost'] })],
    });
    await expect(store.saveSnapshot(broken)).rejects.toBeInstanceOf(StorageError);

    await expect(store.loadSnapshot()).resolves.toEqual(previous);
    expect(await readdir(dataDir)).toEqual(['schedule.db']);
  });

  it('refuses snapshots that fail validation', async () => {
    const invalid = makeSnapshot({ sessions: [makeSession({ id: '1', title: '' })] });
    await expect(store.saveSnapshot(invalid)).rejects.toThrowError(
      'Refusing to write an invalid schedule snapshot.',
    );
    await expect(store.loadSnapshot()).rejects.toBeInstanceOf(SnapshotNotFoundError);
  });
});
