import { isAbsolute, relative, sep } from 'path';

/**
 * Convert a path to forward slashes, strip `./` prefixes and trailing slashes
 */
export function toPosixPath(path: string): string {
  let normalized = path.split(sep).join('/').replace(/\\/g, '/');
  while (normalized.startsWith('./')) {
    normalized = normalized.slice(2);
  }
  normalized = normalized.replace(/\/{2,}/g, '/');
  if (normalized.length > 1 && normalized.endsWith('/')) {
    normalized = normalized.slice(0, -1);
  }
  return normalized === '.' ? '' : normalized;
}

/**
 * Posix path of `target` relative to `root`, or null when outside of it
 */
export function relativePosix(root: string, target: string): string | null {
  const rel = relative(root, target);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    return null;
  }
  return toPosixPath(rel);
}

/**
 * Ancestors of a posix path from the closest to the root, excluding `''`
 */
export function ancestorsOf(posixPath: string): string[] {
  const segments = posixPath.split('/');
  const result: string[] = [];
  for (let i = segments.length - 1; i > 0; i--) {
    result.push(segments.slice(0, i).join('/'));
  }
  return result;
}
