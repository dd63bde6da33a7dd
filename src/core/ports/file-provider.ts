/**
 * File Provider Port
 *
 * File access used by discovery, the changeset store and plan application.
 *
 * Implementations:
 *   - NodeFileProvider: node fs/promises
 *   - MemoryFileProvider: in-memory tree for tests and dry runs
 */

import type { WalkEntry, WalkOptions } from '../../utils/file-walker.js';

export type { WalkEntry, WalkOptions };

export interface FileProvider {
  readText(path: string): Promise<string>;

  /** Write through a temporary sibling renamed into place */
  writeTextAtomic(path: string, content: string): Promise<void>;

  exists(path: string): Promise<boolean>;

  isDirectory(path: string): Promise<boolean>;

  /** Create a directory hierarchy */
  ensureDir(path: string): Promise<void>;

  /** Walk a directory tree, entries in lexicographic depth-first order */
  walk(root: string, options?: WalkOptions): Promise<WalkEntry[]>;

  /** File names directly inside a directory, sorted; empty when missing */
  listFiles(dir: string): Promise<string[]>;

  remove(path: string): Promise<void>;

  rename(from: string, to: string): Promise<void>;

  /** Create a file only if absent; false when it already exists */
  createExclusive(path: string, content: string): Promise<boolean>;
}
