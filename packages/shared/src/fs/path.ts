import path from 'node:path';

/**
 * Normalizes a path to use forward slashes, the form git and diff headers use.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * `path.join` with forward slashes.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}
