/**
 * Bump kinds and their lattice: none < patch < minor < major, with snapshot
 * standing apart from the ordered kinds.
 */

import semver from 'semver';

import type { BumpKind } from '../../types/index.js';

export const BUMP_KINDS: readonly BumpKind[] = ['none', 'patch', 'minor', 'major', 'snapshot'];

const RANK: Record<Exclude<BumpKind, 'snapshot'>, number> = {
  none: 0,
  patch: 1,
  minor: 2,
  major: 3
};

export function isBumpKind(value: unknown): value is BumpKind {
  return typeof value === 'string' && BUMP_KINDS.some(kind => kind === value);
}

export type MergeResult =
  | { ok: true; bump: BumpKind }
  | { ok: false; kinds: [BumpKind, BumpKind] };

/**
 * Combine two bumps for the same package. The higher ordered kind wins;
 * snapshot combined with patch, minor or major is a conflict. `none` is neutral.
 */
export function mergeBumps(a: BumpKind, b: BumpKind): MergeResult {
  if (a === b) return { ok: true, bump: a };
  if (a === 'none') return { ok: true, bump: b };
  if (b === 'none') return { ok: true, bump: a };
  if (a === 'snapshot' || b === 'snapshot') {
    return { ok: false, kinds: [a, b] };
  }
  return { ok: true, bump: RANK[a] >= RANK[b] ? a : b };
}

/**
 * Upper-bound an ordered bump. Snapshot is never capped.
 */
export function capBump(bump: BumpKind, cap: BumpKind): BumpKind {
  if (bump === 'snapshot' || cap === 'snapshot') return bump;
  return RANK[bump] <= RANK[cap] ? bump : cap;
}

/**
 * Lower-bound an ordered bump. Snapshot is left untouched.
 */
export function floorBump(bump: BumpKind, floor: BumpKind): BumpKind {
  if (bump === 'snapshot' || floor === 'snapshot') return bump;
  return RANK[bump] >= RANK[floor] ? bump : floor;
}

/**
 * Max of ordered bumps, ignoring snapshot
 */
export function maxOrderedBump(bumps: Iterable<BumpKind>): BumpKind {
  let result: BumpKind = 'none';
  for (const bump of bumps) {
    if (bump !== 'snapshot' && RANK[bump] > RANK[result]) {
      result = bump;
    }
  }
  return result;
}

/**
 * Whether a bump of `version` breaks caret-style compatibility. On 0.x
 * versions a minor bump counts as breaking.
 */
export function isBreakingBump(version: string, bump: BumpKind): boolean {
  if (bump === 'major') return true;
  if (bump === 'minor') {
    const parsed = semver.parse(version);
    return parsed !== null && parsed.major === 0;
  }
  return false;
}

/**
 * Release version produced by an ordered bump. Prerelease and build
 * components are dropped; `none` keeps the version unchanged.
 */
export function applyBump(version: string, bump: Exclude<BumpKind, 'snapshot'>): string {
  const parsed = semver.parse(version);
  if (!parsed) {
    throw new TypeError(`Invalid semantic version: ${version}`);
  }
  const { major, minor, patch } = parsed;
  switch (bump) {
    case 'major':
      return `${major + 1}.0.0`;
    case 'minor':
      return `${major}.${minor + 1}.0`;
    case 'patch':
      return `${major}.${minor}.${patch + 1}`;
    default:
      return version;
  }
}
