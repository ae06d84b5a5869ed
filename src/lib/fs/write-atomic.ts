import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

/** Writes `contents` beside `filePath`, then renames it into place. */
export async function writeFileAtomic(
  filePath: string,
  contents: string,
): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(
    dir,
    `${path.basename(filePath)}.tmp.${process.pid}.${Date.now()}`,
  );

  await mkdir(dir, { recursive: true });
  try {
    await writeFile(tmpPath, contents, 'utf8');
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}
