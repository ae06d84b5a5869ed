import { mkdtemp, readFile, readdir, rm, utimes, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  SYNC_LOCK_FILENAME,
  acquireSyncLock,
  claimStaleLock,
  isProcessAlive,
} from '@/lib/sync/lock';
import { SyncAlreadyRunningError } from '@/lib/errors';
import { recordingLogger } from '@/test/factories';

// far above any pid the kernel hands out
const DEAD_PID = 2_000_000_000;

describe('acquireSyncLock', () => {
  let dataDir: string;
  let lockPath: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(os.tmpdir(), 'confsched-lock-'));
    lockPath = path.join(dataDir, SYNC_LOCK_FILENAME);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('records the owner and refuses a second holder', async () => {
    const lock = await acquireSyncLock(dataDir, recordingLogger());
    const info: unknown = JSON.parse(await readFile(lockPath, 'utf8'));
    expect(info).toMatchObject({ pid: process.pid });

    await expect(acquireSyncLock(dataDir, recordingLogger())).rejects.toBeInstanceOf(
      SyncAlreadyRunningError,
    );

    await lock.release();
    const again = await acquireSyncLock(dataDir, recordingLogger());
    await again.release();
  });

  it('replaces a lock whose owner is gone', async () => {
    await writeFile(
      lockPath,
      JSON.stringify({ pid: DEAD_PID, startedAt: '2026-01-01T00:00:00.000Z' }),
      'utf8',
    );
    const logger = recordingLogger();
    const lock = await acquireSyncLock(dataDir, logger);
    expect(logger.lines.map((l) => l.message)).toEqual(['removing stale sync lock']);
    await lock.release();
  });

  it('leaves a lock alone that another process took over meanwhile', async () => {
    const stale = JSON.stringify({ pid: DEAD_PID, startedAt: '2026-01-01T00:00:00.000Z' });
    const fresh = JSON.stringify({ pid: process.pid, startedAt: '2026-01-20T15:30:00.000Z' });
    await writeFile(lockPath, fresh, 'utf8');

    await expect(claimStaleLock(lockPath, stale)).resolves.toBe('replaced');
    expect(await readFile(lockPath, 'utf8')).toBe(fresh);
    expect(await readdir(dataDir)).toEqual([SYNC_LOCK_FILENAME]);
  });

  it('deletes the lock it judged stale', async () => {
    const stale = JSON.stringify({ pid: DEAD_PID, startedAt: '2026-01-01T00:00:00.000Z' });
    await writeFile(lockPath, stale, 'utf8');

    await expect(claimStaleLock(lockPath, stale)).resolves.toBe('removed');
    expect(await readdir(dataDir)).toEqual([]);
    await expect(claimStaleLock(lockPath, stale)).resolves.toBe('gone');
  });

  it('waits out an unreadable lock until it is old', async () => {
    await writeFile(lockPath, '', 'utf8');
    await expect(acquireSyncLock(dataDir, recordingLogger())).rejects.toBeInstanceOf(
      SyncAlreadyRunningError,
    );

    const longAgo = new Date(Date.now() - 10 * 60 * 1000);
    await utimes(lockPath, longAgo, longAgo);
    const lock = await acquireSyncLock(dataDir, recordingLogger());
    await lock.release();
  });
});

describe('isProcessAlive', () => {
  it('knows the current process and a missing one', () => {
    expect(isProcessAlive(process.pid)).toBe(true);
    expect(isProcessAlive(DEAD_PID)).toBe(false);
  });
});
