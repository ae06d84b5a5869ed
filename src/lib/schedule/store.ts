import type { Snapshot } from '@/lib/schedule/types';

export interface ScheduleStore {
  saveSnapshot(snapshot: Snapshot): Promise<void>;
  /** Throws `SnapshotNotFoundError` when no sync has completed yet. */
  loadSnapshot(): Promise<Snapshot>;
  lastSyncedAt(): Promise<string | null>;
}
