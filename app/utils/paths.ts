/**
 * Path checks for anything derived from user input (project slugs,
 * export targets under a managed directory).
 */

import { relative, resolve, isAbsolute, sep } from 'path';

const UNSAFE_FILENAME_PARTS = ['..', '/', '\\', '\0', ':', '*', '?', '"', '<', '>', '|'];

/**
 * True when `target` resolves to `baseDir` itself or somewhere beneath it.
 */
export function isSafePath(target: string, baseDir: string): boolean {
  const rel = relative(resolve(baseDir), resolve(target));
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

/**
 * True when `name` is usable as a single path segment on every platform.
 */
export function isSafeFilename(name: string): boolean {
  if (!name) {
    return false;
  }
  if (UNSAFE_FILENAME_PARTS.some((part) => name.includes(part))) {
    return false;
  }
  // Control characters
  return ![...name].some((ch) => ch.charCodeAt(0) < 32);
}

/**
 * Expand a leading `~` to the given home directory
 */
export function expandHome(path: string, home: string): string {
  if (path === '~') return home;
  if (path.startsWith('~/') || path.startsWith('~\\')) {
    return `${home}${path.slice(1)}`;
  }
  return path;
}
