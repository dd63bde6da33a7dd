import type { BumpKind } from './changeset.js';

export type FileCategory = 'source' | 'test' | 'configuration' | 'documentation';

export type ChangeKind = 'added' | 'modified' | 'deleted' | 'renamed';

/**
 * A changed file as reported by the version-control provider.
 */
export interface ChangedFile {
  /** Path relative to the workspace root */
  path: string;
  /** Original path of a rename */
  previousPath?: string;
  kind: ChangeKind;
  staged: boolean;
}

export interface CategoryRule {
  category: Exclude<FileCategory, 'source'>;
  patterns: string[];
  /** Largest bump a change limited to this category should suggest */
  maxBump: BumpKind;
}

export interface AttributedFile {
  path: string;
  category: FileCategory;
}

export interface PackageChanges {
  package: string;
  files: AttributedFile[];
  /** Highest configured weight among the categories of the package's files */
  significance: number;
  maxBumpSuggestion: BumpKind;
}

export interface ChangeAttribution {
  /** Packages containing at least one changed file, sorted */
  directlyAffected: string[];
  /** directlyAffected plus every dependent reachable through reverse edges, sorted */
  transitivelyAffected: string[];
  /** Files outside every package subtree, sorted */
  rootLevelChanges: string[];
  /** One entry per directly affected package, sorted by package */
  packages: PackageChanges[];
}
