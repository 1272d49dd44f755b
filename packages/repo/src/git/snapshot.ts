import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { join } from '@patchproof/shared';
import type { GitService } from './index';

/**
 * Content hashes of every path `git status` reports as changed, keyed by path.
 * Deleted paths hash to `deleted`.
 */
export interface WorkingTreeSnapshot {
  files: Record<string, string>;
}

export function isIgnoredPath(path: string, ignore: readonly string[]): boolean {
  return ignore.some((prefix) => path === prefix.replace(/\/$/, '') || path.startsWith(prefix));
}

async function hashFile(filePath: string): Promise<string> {
  try {
    return createHash('sha256').update(await readFile(filePath)).digest('hex');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return 'deleted';
    throw error;
  }
}

export async function snapshotWorkingTree(
  git: GitService,
  repoRoot: string,
  ignore: readonly string[] = [],
): Promise<WorkingTreeSnapshot> {
  const files: Record<string, string> = {};
  for (const entry of await git.status()) {
    if (isIgnoredPath(entry.path, ignore)) continue;
    files[entry.path] = await hashFile(join(repoRoot, entry.path));
  }
  return { files };
}

/**
 * Paths whose state differs between two snapshots, sorted.
 */
export function diffSnapshots(before: WorkingTreeSnapshot, after: WorkingTreeSnapshot): string[] {
  const paths = new Set([...Object.keys(before.files), ...Object.keys(after.files)]);
  return [...paths].filter((p) => before.files[p] !== after.files[p]).sort();
}
