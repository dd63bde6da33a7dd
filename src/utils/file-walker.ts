/**
 * File Walker Utility
 *
 * Deterministic directory traversal used by the file providers and the
 * workspace discoverer. Entries are yielded in lexicographic order.
 */

import { promises as fs } from 'fs';
import { join } from 'path';

export interface WalkEntry {
  /** Posix path relative to the walk root */
  path: string;
  isDirectory: boolean;
  isSymlink: boolean;
}

/**
 * Filter predicate; returning false skips the entry and, for directories, its subtree
 */
export type WalkFilter = (entry: WalkEntry) => boolean;

/**
 * Options for file walking
 */
export interface WalkOptions {
  filter?: WalkFilter;

  /**
   * Follow symbolic links (default: false)
   */
  followSymlinks?: boolean;

  /**
   * Maximum directory depth to yield, root children are depth 1 (default: unlimited)
   */
  maxDepth?: number;

  /**
   * Only yield directories (default: false)
   */
  directoriesOnly?: boolean;

  /**
   * Directory names never entered (default: node_modules, .git)
   */
  ignoreNames?: string[];
}

export const DEFAULT_IGNORED_NAMES = ['node_modules', '.git'];

/**
 * Async generator that walks a directory tree depth-first.
 *
 * @example
 * for await (const entry of walkEntries('/repo', { directoriesOnly: true })) {
 *   console.log(entry.path);
 * }
 */
export async function* walkEntries(
  root: string,
  options: WalkOptions = {}
): AsyncGenerator<WalkEntry> {
  const {
    filter,
    followSymlinks = false,
    maxDepth = Infinity,
    directoriesOnly = false,
    ignoreNames = DEFAULT_IGNORED_NAMES
  } = options;

  const ignored = new Set(ignoreNames);
  const visitedRealPaths = new Set<string>();
  if (followSymlinks) {
    visitedRealPaths.add(await fs.realpath(root));
  }

  async function* walk(dirAbs: string, dirRel: string, depth: number): AsyncGenerator<WalkEntry> {
    if (depth > maxDepth) {
      return;
    }

    let names: string[];
    try {
      const entries = await fs.readdir(dirAbs, { withFileTypes: true });
      names = entries.map(entry => entry.name).sort();
    } catch (error) {
      // Ignore permission errors and continue
      const code = error && typeof error === 'object' && 'code' in error ? error.code : undefined;
      if (code === 'EACCES' || code === 'EPERM') {
        return;
      }
      throw error;
    }

    for (const name of names) {
      const fullPath = join(dirAbs, name);
      const relPath = dirRel === '' ? name : `${dirRel}/${name}`;
      const lstat = await fs.lstat(fullPath);
      const isSymlink = lstat.isSymbolicLink();
      let isDirectory = lstat.isDirectory();

      if (isSymlink) {
        if (!followSymlinks) {
          continue;
        }
        try {
          const stat = await fs.stat(fullPath);
          isDirectory = stat.isDirectory();
        } catch {
          // Skip broken symlinks
          continue;
        }
      }

      if (isDirectory && ignored.has(name)) {
        continue;
      }

      const entry: WalkEntry = { path: relPath, isDirectory, isSymlink };
      if (filter && !filter(entry)) {
        continue;
      }

      if (isDirectory) {
        yield entry;
        if (followSymlinks) {
          // Symlink loops would otherwise recurse forever
          const real = await fs.realpath(fullPath);
          if (visitedRealPaths.has(real)) {
            continue;
          }
          visitedRealPaths.add(real);
        }
        yield* walk(fullPath, relPath, depth + 1);
      } else if (!directoriesOnly) {
        yield entry;
      }
    }
  }

  yield* walk(root, '', 1);
}

/**
 * Walk a directory and collect all entries into an array
 */
export async function collectEntries(root: string, options: WalkOptions = {}): Promise<WalkEntry[]> {
  const entries: WalkEntry[] = [];
  for await (const entry of walkEntries(root, options)) {
    entries.push(entry);
  }
  return entries;
}
