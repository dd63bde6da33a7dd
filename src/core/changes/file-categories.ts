import { minimatch } from 'minimatch';

import type { AttributedFile, BumpKind, CategoryRule, FileCategory, PackageChanges } from '../../types/index.js';
import { compareStrings } from '../../utils/compare.js';
import { maxOrderedBump } from '../versioning/bump.js';

export interface FileClassification {
  category: FileCategory;
  /** `major` for source files, which are never capped */
  maxBump: BumpKind;
}

const SOURCE: FileClassification = { category: 'source', maxBump: 'major' };

/**
 * Classify a path (relative to its owning package) by the first matching rule
 */
export function classifyFile(path: string, rules: readonly CategoryRule[]): FileClassification {
  for (const rule of rules) {
    if (rule.patterns.some(pattern => minimatch(path, pattern, { dot: true }))) {
      return { category: rule.category, maxBump: rule.maxBump };
    }
  }
  return SOURCE;
}

export interface ClassifiedFile extends AttributedFile {
  maxBump: BumpKind;
}

/**
 * Summarize the classified files of one package
 */
export function summarizePackageChanges(
  pkg: string,
  files: readonly ClassifiedFile[],
  weights: Readonly<Record<FileCategory, number>>
): PackageChanges {
  const unique = new Map<string, ClassifiedFile>();
  for (const file of files) {
    unique.set(file.path, file);
  }
  const sorted = Array.from(unique.values()).sort((a, b) => compareStrings(a.path, b.path));

  const significance = sorted.reduce((max, file) => Math.max(max, weights[file.category]), 0);
  const maxBumpSuggestion = sorted.some(file => file.category === 'source')
    ? 'major'
    : maxOrderedBump(sorted.map(file => file.maxBump));

  return {
    package: pkg,
    files: sorted.map(({ path, category }) => ({ path, category })),
    significance,
    maxBumpSuggestion
  };
}
