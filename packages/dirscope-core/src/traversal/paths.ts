import * as path from 'node:path';

/**
 * Root-relative POSIX path of `target` ('' for the root itself).
 */
export function relativeToRoot(root: string, target: string): string {
  const relative = path.relative(root, target);
  return relative === '' ? '' : relative.split(path.sep).join('/');
}

/**
 * Whether `candidate` lies strictly below `directory`.
 * Compares whole path segments, so `/a/src` does not contain `/a/srcx`.
 */
export function isBelow(directory: string, candidate: string): boolean {
  const prefix = directory.endsWith(path.sep) ? directory : directory + path.sep;
  return candidate.startsWith(prefix);
}
