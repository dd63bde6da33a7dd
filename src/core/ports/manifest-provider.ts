/**
 * Manifest Provider Port
 *
 * Parses package manifests into the schema subset the engine reads and
 * rewrites them without disturbing unrelated fields.
 */

import type { DependencySection, EdgeKind } from '../../types/index.js';

export interface ManifestData {
  name?: string;
  version?: string;
  private: boolean;
  /** `workspaces` as a flat pattern list (`{ packages }` form unwrapped) */
  workspaces?: string[];
  dependencies: Record<EdgeKind, Record<string, string>>;
}

/**
 * A single field replacement, addressed by its JSON path
 */
export interface ManifestFieldUpdate {
  path: ['version'] | [DependencySection, string];
  value: string;
}

export interface ManifestProvider {
  /** Manifest file name inside a package directory */
  readonly fileName: string;

  parse(text: string, path: string): ManifestData;

  /** Apply updates, preserving formatting, field order and unknown fields */
  update(text: string, updates: ManifestFieldUpdate[]): string;
}
