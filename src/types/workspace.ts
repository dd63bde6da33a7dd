/**
 * Workspace model: packages, dependency edges and discovery patterns.
 */

export type EdgeKind = 'runtime' | 'development' | 'peer' | 'optional';

export const EDGE_KINDS: readonly EdgeKind[] = ['runtime', 'development', 'peer', 'optional'];

/**
 * Manifest section that declares each edge kind.
 */
export type DependencySection = 'dependencies' | 'devDependencies' | 'peerDependencies' | 'optionalDependencies';

export const SECTION_BY_KIND: Readonly<Record<EdgeKind, DependencySection>> = {
  runtime: 'dependencies',
  development: 'devDependencies',
  peer: 'peerDependencies',
  optional: 'optionalDependencies'
};

export const KIND_BY_SECTION: Readonly<Record<DependencySection, EdgeKind>> = {
  dependencies: 'runtime',
  devDependencies: 'development',
  peerDependencies: 'peer',
  optionalDependencies: 'optional'
};

export interface DependencyEdge {
  /** Declaring package (always Internal) */
  from: string;
  /** Target package name, Internal or External */
  to: string;
  /** Declared range exactly as written in the manifest */
  range: string;
  kind: EdgeKind;
}

export interface WorkspacePackage {
  name: string;
  version: string;
  private: boolean;
  /** Absolute directory of the package */
  root: string;
  /** Absolute path of the package manifest */
  manifestPath: string;
  /** Posix path of the package directory relative to the workspace root */
  relativePath: string;
  dependencies: DependencyEdge[];
  /**
   * - 'pattern'    => matched by a workspace pattern
   * - 'path-alias' => only reached through a file:/link:/portal: dependency
   */
  discoveredVia: 'pattern' | 'path-alias';
}

export interface WorkspacePattern {
  pattern: string;
  /** Higher priority patterns are processed first (default 0) */
  priority?: number;
  /** Extra subpatterns a matched directory must satisfy (any of) */
  include?: string[];
  /** Subpatterns that exclude a directory and its subtree */
  exclude?: string[];
  /** Maximum directory depth below the workspace root */
  maxDepth?: number;
  followSymlinks?: boolean;
  /** Lets this pattern win a path collision with an earlier pattern */
  overrideDetection?: boolean;
}

export interface OrphanManifest {
  relativePath: string;
  manifestPath: string;
  name?: string;
}

export interface Workspace {
  root: string;
  rootManifestPath: string;
  /** Patterns the discovery ran with, in processing order */
  patterns: WorkspacePattern[];
  /** Global excludes (`!pattern` entries of the root manifest) */
  excludes: string[];
  /** Internal packages sorted by name */
  packages: WorkspacePackage[];
  /** Names of every dependency target declared by an Internal package, sorted */
  declaredDependencyNames: string[];
  orphans: OrphanManifest[];
}
