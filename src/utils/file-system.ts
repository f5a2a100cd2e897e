/**
 * File system helpers shared by the metadata store, lockfiles and backends.
 */
import * as fs from 'fs-extra';
import * as path from 'path';
import { randomBytes } from 'crypto';

const TEMP_SUFFIX = '.tmp';

/**
 * Write a file so that readers only ever see the old or the new content.
 * The data goes to a sibling temp file first, which is then renamed over the
 * target (rename is atomic within one filesystem).
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.ensureDir(dir);
  const tmpPath = `${filePath}.${process.pid}.${randomBytes(4).toString('hex')}${TEMP_SUFFIX}`;
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.remove(tmpPath);
    throw error;
  }
}

/**
 * Recursively sum file sizes below a directory. Symlinks are not followed.
 */
export async function calculateDirectorySize(dirPath: string): Promise<number> {
  let size = 0;
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      size += await calculateDirectorySize(entryPath);
    } else if (entry.isFile()) {
      const stat = await fs.lstat(entryPath);
      size += stat.size;
    }
  }
  return size;
}

/**
 * List immediate subdirectory names, skipping hidden entries.
 */
export async function listSubdirectories(dirPath: string): Promise<string[]> {
  if (!(await fs.pathExists(dirPath))) {
    return [];
  }
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
    .map((entry) => entry.name);
}
