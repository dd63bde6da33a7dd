import { promises as fs, constants as fsConstants } from 'fs';
import { dirname, basename, join } from 'path';
import { randomBytes } from 'crypto';
import { parse as parseJsonc, type ParseError, printParseErrorCode } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path }, error);
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path }, error);
  }
}

/**
 * Write text to a temporary sibling and rename it into place
 */
export async function writeTextFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${randomBytes(4).toString('hex')}.tmp`);
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, path);
    logger.debug(`Wrote file atomically: ${path}`);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new FileSystemError(`Failed to write file: ${path}`, { path }, error);
  }
}

/**
 * Create a file only if it does not exist yet. Returns false when it already exists.
 */
export async function createExclusive(path: string, content: string): Promise<boolean> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, { encoding: 'utf8', flag: 'wx' });
    return true;
  } catch (error) {
    if (errorCode(error) === 'EEXIST') {
      return false;
    }
    throw new FileSystemError(`Failed to create file: ${path}`, { path }, error);
  }
}

/**
 * Rename a file, replacing the destination
 */
export async function renameFile(srcPath: string, destPath: string): Promise<void> {
  try {
    await ensureDir(dirname(destPath));
    await fs.rename(srcPath, destPath);
    logger.debug(`Renamed: ${srcPath} -> ${destPath}`);
  } catch (error) {
    throw new FileSystemError(`Failed to rename: ${srcPath} -> ${destPath}`, { srcPath, destPath }, error);
  }
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      // File doesn't exist, which is fine
      return;
    }
    throw new FileSystemError(`Failed to remove: ${path}`, { path }, error);
  }
}

/**
 * List files in a directory (non-recursive), sorted, skipping OS junk files
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && !isJunk(entry.name))
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return [];
    }
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath }, error);
  }
}

/**
 * Read a JSON or JSONC file (auto-detect format) and parse it
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new FileSystemError(
      `Failed to parse JSON/JSONC file: ${path} (${first ? printParseErrorCode(first.error) : 'unknown'} at offset ${first?.offset ?? 0})`,
      { path }
    );
  }
  return result;
}
