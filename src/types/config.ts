import type { CategoryRule, FileCategory } from './attribution.js';
import type { BumpKind } from './changeset.js';
import type { PropagationPolicy } from './plan.js';
import type { Severity, ValidationCategory } from './validation.js';
import type { EdgeKind, WorkspacePattern } from './workspace.js';

export type ChangesetFormat = 'yaml' | 'json';

/**
 * Engine configuration. Read once at construction and never mutated.
 */
export interface EngineConfig {
  /** Overrides the root manifest `workspaces` field when non-empty */
  workspacePatterns: WorkspacePattern[];
  /** Fail discovery when a manifest sits outside every pattern */
  strictCoverage: boolean;
  significanceWeights: Record<FileCategory, number>;
  categoryRules: CategoryRule[];
  /** Bump given to affected packages that carry no changeset */
  defaultBump: BumpKind;
  /** Snapshot version template; `{version}` renders the current version with patch + 1 */
  snapshotTemplate: string;
  propagation: PropagationPolicy;
  propagateKinds: EdgeKind[];
  environments: string[];
  validationSeverity: Partial<Record<ValidationCategory, Severity>>;
  changesetDir: string;
  changesetFormat: ChangesetFormat;
}

/**
 * Shape accepted from configuration files before validation.
 */
export type EngineConfigInput = Partial<EngineConfig>;
