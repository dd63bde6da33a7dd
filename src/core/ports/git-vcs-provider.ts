import { execFile } from 'child_process';
import { promisify } from 'util';

import type { ChangedFile, ChangeKind } from '../../types/index.js';
import type { VcsProvider } from './vcs-provider.js';
import { ErrorCodes } from '../../types/index.js';
import { ProviderError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { toPosixPath } from '../../utils/paths.js';
import { compareStrings } from '../../utils/compare.js';

const execFileAsync = promisify(execFile);

function stderrOf(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'stderr' in error) {
    const stderr = error.stderr;
    if (typeof stderr === 'string' && stderr.trim().length > 0) return stderr.trim();
    if (Buffer.isBuffer(stderr) && stderr.length > 0) return stderr.toString('utf8').trim();
  }
  return undefined;
}

function kindFromStatus(status: string): ChangeKind {
  switch (status.charAt(0)) {
    case 'A':
    case 'C':
      return 'added';
    case 'D':
      return 'deleted';
    case 'R':
      return 'renamed';
    default:
      return 'modified';
  }
}

/**
 * Parse `git diff --name-status -z` output. Fields are NUL separated and
 * unquoted: `M\0path\0`, or `R100\0old\0new\0` for renames and copies.
 */
export function parseNameStatus(output: string, staged: boolean): ChangedFile[] {
  const fields = output.split('\0');
  const files: ChangedFile[] = [];
  let position = 0;
  while (position < fields.length) {
    const status = fields[position++] ?? '';
    if (status.length === 0) continue;
    const first = fields[position++];
    if (!first) break;
    const kind = kindFromStatus(status);
    if (status.startsWith('R') || status.startsWith('C')) {
      const second = fields[position++];
      if (!second) break;
      files.push(kind === 'renamed'
        ? { path: toPosixPath(second), previousPath: toPosixPath(first), kind, staged }
        : { path: toPosixPath(second), kind, staged });
    } else {
      files.push({ path: toPosixPath(first), kind, staged });
    }
  }
  return files;
}

/**
 * VcsProvider running the git CLI inside the workspace root
 */
export class GitVcsProvider implements VcsProvider {
  constructor(private readonly cwd: string) {}

  private async runGit(args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync('git', args, { cwd: this.cwd, maxBuffer: 64 * 1024 * 1024 });
      return stdout;
    } catch (error) {
      const message = stderrOf(error) ?? (error instanceof Error ? error.message : String(error));
      throw new ProviderError(`Git command failed: git ${args.join(' ')}: ${message}`, ErrorCodes.VCS_ERROR, { args }, error);
    }
  }

  async currentRevision(): Promise<string> {
    return (await this.runGit(['rev-parse', 'HEAD'])).trim();
  }

  async currentBranch(): Promise<string> {
    return (await this.runGit(['rev-parse', '--abbrev-ref', 'HEAD'])).trim();
  }

  async changedFiles(from: string, to?: string): Promise<ChangedFile[]> {
    const base = ['diff', '--name-status', '-z', '-M', '--relative'];
    let files: ChangedFile[];
    if (to) {
      files = parseNameStatus(await this.runGit([...base, from, to]), false);
    } else {
      const staged = parseNameStatus(await this.runGit([...base, '--cached', from]), true);
      const unstaged = parseNameStatus(await this.runGit([...base, from]), false);
      const stagedPaths = new Set(staged.map(file => file.path));
      files = [...staged, ...unstaged.filter(file => !stagedPaths.has(file.path))];
    }
    files.sort((a, b) => compareStrings(a.path, b.path));
    logger.debug(`git reported ${files.length} changed file(s)`, { from, to });
    return files;
  }
}
