import { posix } from 'path';
import type { FileProvider, WalkEntry, WalkOptions } from './file-provider.js';
import { DEFAULT_IGNORED_NAMES } from '../../utils/file-walker.js';
import { FileSystemError } from '../../utils/errors.js';

/**
 * In-memory FileProvider. Paths are absolute posix paths; symbolic links
 * are not modelled.
 */
export class MemoryFileProvider implements FileProvider {
  private files = new Map<string, string>();
  private dirs = new Set<string>(['/']);

  constructor(initial: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(initial)) {
      this.setFile(path, content);
    }
  }

  private normalize(path: string): string {
    return posix.resolve('/', path);
  }

  private addParents(path: string): void {
    let dir = posix.dirname(path);
    while (!this.dirs.has(dir)) {
      this.dirs.add(dir);
      dir = posix.dirname(dir);
    }
  }

  /** Synchronous seeding helper for fixtures */
  setFile(path: string, content: string): void {
    const normalized = this.normalize(path);
    this.files.set(normalized, content);
    this.addParents(normalized);
  }

  /** Snapshot of every file, sorted by path */
  snapshot(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const path of Array.from(this.files.keys()).sort()) {
      result[path] = this.files.get(path) ?? '';
    }
    return result;
  }

  async readText(path: string): Promise<string> {
    const content = this.files.get(this.normalize(path));
    if (content === undefined) {
      throw new FileSystemError(`Failed to read file: ${path}`, { path });
    }
    return content;
  }

  async writeTextAtomic(path: string, content: string): Promise<void> {
    this.setFile(path, content);
  }

  async exists(path: string): Promise<boolean> {
    const normalized = this.normalize(path);
    return this.files.has(normalized) || this.dirs.has(normalized);
  }

  async isDirectory(path: string): Promise<boolean> {
    return this.dirs.has(this.normalize(path));
  }

  async ensureDir(path: string): Promise<void> {
    const normalized = this.normalize(path);
    if (this.files.has(normalized)) {
      throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path });
    }
    this.dirs.add(normalized);
    this.addParents(normalized);
  }

  async walk(root: string, options: WalkOptions = {}): Promise<WalkEntry[]> {
    const {
      filter,
      maxDepth = Infinity,
      directoriesOnly = false,
      ignoreNames = DEFAULT_IGNORED_NAMES
    } = options;
    const ignored = new Set(ignoreNames);
    const base = this.normalize(root);
    const results: WalkEntry[] = [];

    const visit = (dirAbs: string, dirRel: string, depth: number): void => {
      if (depth > maxDepth) {
        return;
      }
      for (const name of this.childNames(dirAbs)) {
        const fullPath = posix.join(dirAbs, name);
        const relPath = dirRel === '' ? name : `${dirRel}/${name}`;
        const isDirectory = this.dirs.has(fullPath);
        if (isDirectory && ignored.has(name)) {
          continue;
        }
        const entry: WalkEntry = { path: relPath, isDirectory, isSymlink: false };
        if (filter && !filter(entry)) {
          continue;
        }
        if (isDirectory) {
          results.push(entry);
          visit(fullPath, relPath, depth + 1);
        } else if (!directoriesOnly) {
          results.push(entry);
        }
      }
    };

    visit(base, '', 1);
    return results;
  }

  private childNames(dirAbs: string): string[] {
    const names = new Set<string>();
    const collect = (path: string): void => {
      if (path !== dirAbs && posix.dirname(path) === dirAbs) {
        names.add(posix.basename(path));
      }
    };
    this.files.forEach((_content, path) => collect(path));
    this.dirs.forEach(path => collect(path));
    return Array.from(names).sort();
  }

  async listFiles(dir: string): Promise<string[]> {
    const base = this.normalize(dir);
    return this.childNames(base).filter(name => this.files.has(posix.join(base, name)));
  }

  async remove(path: string): Promise<void> {
    const normalized = this.normalize(path);
    const prefix = `${normalized}/`;
    this.files.delete(normalized);
    this.dirs.delete(normalized);
    for (const key of Array.from(this.files.keys())) {
      if (key.startsWith(prefix)) this.files.delete(key);
    }
    for (const key of Array.from(this.dirs)) {
      if (key.startsWith(prefix)) this.dirs.delete(key);
    }
  }

  async rename(from: string, to: string): Promise<void> {
    const source = this.normalize(from);
    const content = this.files.get(source);
    if (content === undefined) {
      throw new FileSystemError(`Failed to rename: ${from} -> ${to}`, { from, to });
    }
    this.files.delete(source);
    this.setFile(to, content);
  }

  async createExclusive(path: string, content: string): Promise<boolean> {
    if (await this.exists(path)) {
      return false;
    }
    this.setFile(path, content);
    return true;
  }
}
