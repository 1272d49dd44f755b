import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir, pathExists, readJson } from 'fs-extra';

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes to a sibling temp file and renames it over `path`, so readers never see a partial file.
 */
export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path), prefix: '.tmp-' });
  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function atomicWriteJson(path: string, value: unknown): Promise<void> {
  await atomicWrite(path, JSON.stringify(value, null, 2) + '\n');
}

/**
 * Parsed JSON, or `undefined` when the file does not exist.
 */
export async function readJsonIfExists(path: string): Promise<unknown> {
  if (!(await pathExists(path))) return undefined;
  const value: unknown = await readJson(path);
  return value;
}
