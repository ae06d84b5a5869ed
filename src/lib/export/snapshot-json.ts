import { writeFileAtomic } from '@/lib/fs/write-atomic';
import { snapshotSchema, type Snapshot } from '@/lib/schedule/types';

/** Writes the snapshot in the same layout as the bundled fallback file. */
export async function writeSnapshotJson(
  snapshot: Snapshot,
  filePath: string,
): Promise<void> {
  const parsed = snapshotSchema.parse(snapshot);
  await writeFileAtomic(filePath, JSON.stringify(parsed, null, 2) + '\n');
}
