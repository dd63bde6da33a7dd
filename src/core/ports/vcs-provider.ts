/**
 * Version-Control Provider Port
 *
 * Opaque source of revision identifiers and changed-file lists.
 */

import type { ChangedFile } from '../../types/index.js';

export interface VcsProvider {
  currentRevision(): Promise<string>;

  currentBranch(): Promise<string>;

  /**
   * Files changed between two revisions, relative to the workspace root.
   * Without `to`, compares `from` against the working tree (staged and unstaged).
   */
  changedFiles(from: string, to?: string): Promise<ChangedFile[]>;
}
