import { mkdir, open, readFile, rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { SyncAlreadyRunningError, isErrnoException } from '@/lib/errors';
import type { Logger } from '@/lib/log';

export const SYNC_LOCK_FILENAME = 'sync.lock';

// unreadable lock files younger than this may still be mid-write
const UNREADABLE_LOCK_GRACE_MS = 60_000;

const lockInfoSchema = z.object({
  pid: z.number().int().positive(),
  startedAt: z.string(),
});

type LockInfo = z.infer<typeof lockInfoSchema>;

export type SyncLock = {
  lockPath: string;
  release(): Promise<void>;
};

type LockFile = {
  raw: string;
  info: LockInfo | null;
};

async function readLockFile(filePath: string): Promise<LockFile | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return null;
    throw err;
  }
  try {
    const parsed = lockInfoSchema.safeParse(JSON.parse(raw));
    return { raw, info: parsed.success ? parsed.data : null };
  } catch (err) {
    if (err instanceof SyntaxError) return { raw, info: null };
    throw err;
  }
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return !isErrnoException(err, 'ESRCH');
  }
}

async function isStale(lockPath: string, info: LockInfo | null): Promise<boolean> {
  if (info) return !isProcessAlive(info.pid);
  try {
    const s = await stat(lockPath);
    return Date.now() - s.mtimeMs > UNREADABLE_LOCK_GRACE_MS;
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return true;
    throw err;
  }
}

export type StaleLockClaim = 'removed' | 'gone' | 'replaced';

/**
 * Moves the lock file aside and deletes it only if it still holds `staleRaw`,
 * the contents that were judged stale. Another process may have replaced the
 * lock in between; that lock is moved back untouched.
 */
export async function claimStaleLock(
  lockPath: string,
  staleRaw: string,
): Promise<StaleLockClaim> {
  const claimedPath = `${lockPath}.stale.${process.pid}.${Date.now()}`;
  try {
    await rename(lockPath, claimedPath);
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return 'gone';
    throw err;
  }

  const claimed = await readLockFile(claimedPath);
  if (claimed && claimed.raw !== staleRaw) {
    await rename(claimedPath, lockPath);
    return 'replaced';
  }
  await rm(claimedPath, { force: true });
  return 'removed';
}

/**
 * Takes the data directory's sync lock or fails with
 * `SyncAlreadyRunningError`. A lock left by a process that is gone is replaced.
 */
export async function acquireSyncLock(
  dataDir: string,
  logger: Logger,
): Promise<SyncLock> {
  const lockPath = path.join(dataDir, SYNC_LOCK_FILENAME);
  await mkdir(dataDir, { recursive: true });

  for (let attempt = 0; attempt < 3; attempt += 1) {
    try {
      const handle = await open(lockPath, 'wx');
      try {
        await handle.writeFile(
          JSON.stringify({
            pid: process.pid,
            startedAt: new Date().toISOString(),
          }),
          'utf8',
        );
      } finally {
        await handle.close();
      }
      return {
        lockPath,
        release: async () => {
          await rm(lockPath, { force: true });
        },
      };
    } catch (err) {
      if (!isErrnoException(err, 'EEXIST')) throw err;

      const holder = await readLockFile(lockPath);
      // released between our open and read
      if (!holder) continue;
      if (!(await isStale(lockPath, holder.info))) {
        throw new SyncAlreadyRunningError({
          lockPath,
          pid: holder.info?.pid ?? null,
          startedAt: holder.info?.startedAt ?? null,
        });
      }

      logger.warn('removing stale sync lock', {
        lockPath,
        pid: holder.info?.pid ?? null,
      });
      if ((await claimStaleLock(lockPath, holder.raw)) === 'replaced') {
        throw new SyncAlreadyRunningError({ lockPath });
      }
    }
  }

  throw new SyncAlreadyRunningError({ lockPath });
}
