import { access, readFile } from 'node:fs/promises';
import { isAbsolute, relative, resolve, sep } from 'node:path';

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function readFileIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch {
    return null;
  }
}

/** A trailing separator marks a required path as a directory. */
export function isDirectoryPath(relativePath: string): boolean {
  return relativePath.endsWith('/') || relativePath.endsWith('\\');
}

/**
 * Resolves `relativePath` against `root`, or returns null when the result
 * would land outside `root`.
 */
export function resolveInside(root: string, relativePath: string): string | null {
  const absolute = resolve(root, relativePath);
  const rel = relative(root, absolute);
  if (rel === '') return absolute;
  if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return null;
  return absolute;
}
