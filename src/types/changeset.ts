export type BumpKind = 'none' | 'patch' | 'minor' | 'major' | 'snapshot';

export type ChangesetStatus = 'pending' | 'applied' | 'discarded';

export interface Changeset {
  id: string;
  package: string;
  bump: BumpKind;
  description: string;
  author: string;
  /** ISO-8601 UTC */
  createdAt: string;
  environments: string[];
  status: ChangesetStatus;
  productionDeployment: boolean;
}

export interface ChangesetInput {
  package: string;
  bump: BumpKind;
  description: string;
  author: string;
  environments?: string[];
  productionDeployment?: boolean;
}

export interface ChangesetFilter {
  status?: ChangesetStatus;
  package?: string;
  author?: string;
  environment?: string;
}
