import type { FileProvider, WalkEntry, WalkOptions } from './file-provider.js';
import { collectEntries } from '../../utils/file-walker.js';
import {
  createExclusive,
  ensureDir,
  exists,
  isDirectory,
  listFiles,
  readTextFile,
  remove,
  renameFile,
  writeTextFileAtomic
} from '../../utils/fs.js';
import { FileSystemError } from '../../utils/errors.js';

/**
 * FileProvider backed by the local file system
 */
export class NodeFileProvider implements FileProvider {
  readText(path: string): Promise<string> {
    return readTextFile(path);
  }

  writeTextAtomic(path: string, content: string): Promise<void> {
    return writeTextFileAtomic(path, content);
  }

  exists(path: string): Promise<boolean> {
    return exists(path);
  }

  isDirectory(path: string): Promise<boolean> {
    return isDirectory(path);
  }

  ensureDir(path: string): Promise<void> {
    return ensureDir(path);
  }

  async walk(root: string, options?: WalkOptions): Promise<WalkEntry[]> {
    try {
      return await collectEntries(root, options);
    } catch (error) {
      if (error instanceof FileSystemError) {
        throw error;
      }
      throw new FileSystemError(`Failed to walk directory: ${root}`, { root }, error);
    }
  }

  listFiles(dir: string): Promise<string[]> {
    return listFiles(dir);
  }

  remove(path: string): Promise<void> {
    return remove(path);
  }

  rename(from: string, to: string): Promise<void> {
    return renameFile(from, to);
  }

  createExclusive(path: string, content: string): Promise<boolean> {
    return createExclusive(path, content);
  }
}
