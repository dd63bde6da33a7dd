import type { BumpKind } from './changeset.js';
import type { DependencySection } from './workspace.js';

export type PropagationPolicy = 'conservative' | 'default' | 'aggressive';

export type ConflictMode = 'failFast' | 'collectAll';

export type ConflictKind = 'MIXED_SNAPSHOT' | 'CYCLE_PREVENTS_ORDERING' | 'INCOMPATIBLE_RANGE';

export interface PlanConflict {
  kind: ConflictKind;
  message: string;
  packages: string[];
}

export interface ManifestEdit {
  /** Package whose manifest is edited */
  package: string;
  manifestPath: string;
  field: 'version' | DependencySection;
  /** Dependency name for range edits */
  dependency?: string;
  from: string;
  to: string;
}

/**
 * Why a package entered the plan.
 * - changeset   => a pending changeset targets it
 * - affected    => seeded from a change attribution
 * - propagation => a dependency it consumes is bumped
 * - range       => its manifest needs a range edit
 */
export interface BumpReason {
  type: 'changeset' | 'affected' | 'propagation' | 'range';
  /** Changeset id or the dependency name that triggered the bump */
  source?: string;
}

export interface VersionPlanStep {
  package: string;
  currentVersion: string;
  newVersion: string;
  bump: BumpKind;
  reasons: BumpReason[];
  /** The step's own version edit first, then consumer range edits sorted by package */
  edits: ManifestEdit[];
}

export interface VersionPlan {
  steps: VersionPlanStep[];
  /** Ids of the changesets the plan consumed, sorted */
  changesets: string[];
}
