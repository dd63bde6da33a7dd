import type {
  BumpKind,
  BumpReason,
  ChangeAttribution,
  Changeset,
  ConflictMode,
  DependencyGraph,
  EdgeKind,
  EngineConfig,
  GraphEdge,
  Logger,
  ManifestEdit,
  PlanConflict,
  PropagationPolicy,
  VersionPlan,
  VersionPlanStep,
  Workspace,
  WorkspacePackage
} from '../../types/index.js';
import { ErrorCodes } from '../../types/index.js';
import { throwIfCancelled } from '../../utils/cancellation.js';
import { compareStrings } from '../../utils/compare.js';
import { ChangesetError, PlanningError } from '../../utils/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { cyclesTouching, findIndex, incomingEdges } from '../graph/graph-query.js';
import { applyBump, capBump, floorBump, isBreakingBump, mergeBumps } from '../versioning/bump.js';
import { rangeAdmits } from '../versioning/ranges.js';
import { renderSnapshotVersion } from '../versioning/snapshot.js';
import { computeRangeEdits } from './manifest-edits.js';

export interface VersioningStrategy {
  propagation: PropagationPolicy;
  /** Edge kinds whose consumers receive propagated bumps; peers always do */
  propagateKinds: readonly EdgeKind[];
  snapshotTemplate: string;
}

export interface PlanOptions {
  /** Changesets to consume; only pending ones are used */
  changesets: readonly Changeset[];
  /** Seeds directly affected packages that carry no changeset */
  attribution?: ChangeAttribution;
  strategy?: Partial<VersioningStrategy>;
  conflictMode?: ConflictMode;
  /** Revision identifier for `{sha}` */
  sha?: string;
  now?: Date;
}

export interface VersionPlannerOptions {
  config: Readonly<EngineConfig>;
  logger?: Logger;
  signal?: AbortSignal;
}

interface PlanEntry {
  bump: BumpKind;
  /** Merged bump of the package's own changesets or affected seed */
  own: BumpKind;
  reasons: BumpReason[];
}

const REASON_ORDER: Record<BumpReason['type'], number> = {
  changeset: 0,
  affected: 1,
  propagation: 2,
  range: 3
};

/**
 * Bump a consumer receives when one of its dependencies is bumped.
 * Conservative always yields patch; otherwise a snapshot dependency yields
 * snapshot.
 */
export function propagatedBump(
  policy: PropagationPolicy,
  dependencyBump: BumpKind,
  dependencyVersion: string,
  consumerRange: string
): BumpKind {
  if (dependencyBump === 'none') return 'none';
  switch (policy) {
    case 'conservative':
      return 'patch';
    case 'aggressive':
      return dependencyBump;
    default: {
      if (dependencyBump === 'snapshot') return 'snapshot';
      const next = applyBump(dependencyVersion, dependencyBump);
      if (rangeAdmits(consumerRange, next)) return 'patch';
      return isBreakingBump(dependencyVersion, dependencyBump) ? 'major' : 'minor';
    }
  }
}

/**
 * Collects conflicts, throwing on the first one in failFast mode
 */
class ConflictLog {
  private readonly byKey = new Map<string, PlanConflict>();

  constructor(private readonly mode: ConflictMode) {}

  add(conflict: PlanConflict): void {
    const packages = [...conflict.packages].sort(compareStrings);
    const normalized = { ...conflict, packages };
    const key = `${conflict.kind}:${packages.join(',')}`;
    if (this.byKey.has(key)) return;
    if (this.mode === 'failFast') {
      throw new PlanningError([normalized]);
    }
    this.byKey.set(key, normalized);
  }

  has(kind: PlanConflict['kind'], pkg: string): boolean {
    return Array.from(this.byKey.values()).some(conflict => conflict.kind === kind && conflict.packages.includes(pkg));
  }

  all(): PlanConflict[] {
    return Array.from(this.byKey.values());
  }
}

/**
 * Turns pending changesets into an ordered plan of version bumps.
 */
export class VersionPlanner {
  private readonly config: Readonly<EngineConfig>;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;

  constructor(options: VersionPlannerOptions) {
    this.config = options.config;
    this.logger = options.logger ?? defaultLogger;
    this.signal = options.signal;
  }

  plan(workspace: Workspace, graph: DependencyGraph, options: PlanOptions): VersionPlan {
    throwIfCancelled(this.signal);
    const strategy: VersioningStrategy = {
      propagation: options.strategy?.propagation ?? this.config.propagation,
      propagateKinds: options.strategy?.propagateKinds ?? this.config.propagateKinds,
      snapshotTemplate: options.strategy?.snapshotTemplate ?? this.config.snapshotTemplate
    };
    const conflicts = new ConflictLog(options.conflictMode ?? 'failFast');
    const packages = new Map<string, WorkspacePackage>(workspace.packages.map(pkg => [pkg.name, pkg]));
    const entries = new Map<number, PlanEntry>();
    const incoming = incomingEdges(graph);
    const caps = new Map<string, BumpKind>(
      (options.attribution?.packages ?? []).map(changes => [changes.package, changes.maxBumpSuggestion])
    );

    const pending = options.changesets
      .filter(changeset => changeset.status === 'pending')
      .sort((a, b) => compareStrings(a.id, b.id));

    this.aggregate(graph, pending, entries, conflicts);
    this.seedAffected(graph, options.attribution, entries, caps);

    const now = options.now ?? new Date();
    let versions = new Map<number, string>();
    let rangeEdits = new Map<number, ManifestEdit[]>();
    for (;;) {
      throwIfCancelled(this.signal);
      this.propagate(graph, incoming, strategy, entries, caps);
      this.checkCycles(graph, entries, conflicts);

      versions = this.synthesizeVersions(graph, strategy, entries, conflicts, options.sha, now);
      rangeEdits = new Map();
      const added: number[] = [];
      for (const [index, version] of versions) {
        const dependency = graph.nodes[index]?.name ?? '';
        const result = computeRangeEdits(graph, packages, index, incoming[index] ?? [], version);
        for (const { consumer, range } of result.incompatible) {
          conflicts.add({
            kind: 'INCOMPATIBLE_RANGE',
            message: `${consumer} declares ${dependency}@${range}, which cannot be widened to admit ${version}`,
            packages: [consumer, dependency]
          });
        }
        rangeEdits.set(index, result.edits);

        for (const edit of result.edits) {
          const consumer = findIndex(graph, edit.package);
          if (consumer === undefined) continue;
          const entry = entries.get(consumer);
          if (!entry || entry.bump === 'none') {
            const reasons = entry?.reasons ?? [];
            reasons.push({ type: 'range', source: dependency });
            entries.set(consumer, { bump: 'patch', own: entry?.own ?? 'none', reasons });
            added.push(consumer);
          }
        }
      }
      if (added.length === 0) break;
      this.logger.debug(`Range edits pulled ${added.length} consumer(s) into the plan`);
    }

    const found = conflicts.all();
    if (found.length > 0) {
      throw new PlanningError(found);
    }

    const steps: VersionPlanStep[] = [];
    for (const name of graph.order) {
      const index = findIndex(graph, name);
      if (index === undefined) continue;
      const entry = entries.get(index);
      const newVersion = versions.get(index);
      const pkg = packages.get(name);
      if (!entry || entry.bump === 'none' || newVersion === undefined || !pkg) continue;

      steps.push({
        package: name,
        currentVersion: pkg.version,
        newVersion,
        bump: entry.bump,
        reasons: sortReasons(entry.reasons),
        edits: [
          { package: name, manifestPath: pkg.manifestPath, field: 'version', from: pkg.version, to: newVersion },
          ...(rangeEdits.get(index) ?? [])
        ]
      });
    }

    this.logger.debug(`Planned ${steps.length} step(s) from ${pending.length} changeset(s)`);
    return { steps, changesets: pending.map(changeset => changeset.id) };
  }

  /**
   * Merge pending changesets per package
   */
  private aggregate(
    graph: DependencyGraph,
    pending: readonly Changeset[],
    entries: Map<number, PlanEntry>,
    conflicts: ConflictLog
  ): void {
    for (const changeset of pending) {
      const index = findIndex(graph, changeset.package);
      if (index === undefined) {
        throw new ChangesetError(
          `Changeset ${changeset.id} targets unknown package "${changeset.package}"`,
          ErrorCodes.INVALID_CHANGESET,
          { id: changeset.id, packageName: changeset.package }
        );
      }
      const entry: PlanEntry = entries.get(index) ?? { bump: 'none', own: 'none', reasons: [] };
      entry.reasons.push({ type: 'changeset', source: changeset.id });
      const merged = mergeBumps(entry.bump, changeset.bump);
      if (merged.ok) {
        entry.bump = merged.bump;
        entry.own = merged.bump;
      } else {
        conflicts.add({
          kind: 'MIXED_SNAPSHOT',
          message: `${changeset.package} has both snapshot and ${merged.kinds.find(kind => kind !== 'snapshot') ?? 'release'} changesets`,
          packages: [changeset.package]
        });
      }
      entries.set(index, entry);
    }
  }

  /**
   * Affected packages without a changeset get the default bump, capped by the
   * attribution's suggestion
   */
  private seedAffected(
    graph: DependencyGraph,
    attribution: ChangeAttribution | undefined,
    entries: Map<number, PlanEntry>,
    caps: ReadonlyMap<string, BumpKind>
  ): void {
    for (const name of attribution?.directlyAffected ?? []) {
      const index = findIndex(graph, name);
      if (index === undefined || entries.has(index)) continue;
      const bump = capBump(this.config.defaultBump, caps.get(name) ?? 'major');
      if (bump === 'none') continue;
      entries.set(index, { bump, own: bump, reasons: [{ type: 'affected' }] });
    }
  }

  /**
   * Push bumps to consumers until a full pass changes nothing
   */
  private propagate(
    graph: DependencyGraph,
    incoming: readonly GraphEdge[][],
    strategy: VersioningStrategy,
    entries: Map<number, PlanEntry>,
    caps: ReadonlyMap<string, BumpKind>
  ): void {
    const kinds = new Set<EdgeKind>([...strategy.propagateKinds, 'peer']);
    const order = graph.order
      .map(name => findIndex(graph, name))
      .filter((index): index is number => index !== undefined);

    let changed = true;
    while (changed) {
      changed = false;
      for (const dependency of order) {
        const source = entries.get(dependency);
        const node = graph.nodes[dependency];
        if (!source || source.bump === 'none' || !node) continue;

        for (const edge of incoming[dependency] ?? []) {
          if (!kinds.has(edge.kind)) continue;
          const consumer = graph.nodes[edge.from];
          if (!consumer) continue;

          let candidate = propagatedBump(strategy.propagation, source.bump, node.version, edge.range);
          candidate = floorBump(capBump(candidate, caps.get(consumer.name) ?? 'major'), 'patch');

          const entry: PlanEntry = entries.get(edge.from) ?? { bump: 'none', own: 'none', reasons: [] };
          if (!entry.reasons.some(reason => reason.type === 'propagation' && reason.source === node.name)) {
            entry.reasons.push({ type: 'propagation', source: node.name });
          }
          const next = resolvePropagated(entry, candidate);
          if (next !== entry.bump) {
            entry.bump = next;
            changed = true;
          }
          entries.set(edge.from, entry);
        }
      }
    }
  }

  private checkCycles(graph: DependencyGraph, entries: ReadonlyMap<number, PlanEntry>, conflicts: ConflictLog): void {
    const planned = new Set<string>();
    for (const [index, entry] of entries) {
      const node = graph.nodes[index];
      if (node && entry.bump !== 'none') planned.add(node.name);
    }
    for (const cycle of cyclesTouching(graph, planned)) {
      conflicts.add({
        kind: 'CYCLE_PREVENTS_ORDERING',
        message: `Dependency cycle ${cycle.join(' -> ')} -> ${cycle[0] ?? ''} prevents ordering`,
        packages: cycle
      });
    }
  }

  private synthesizeVersions(
    graph: DependencyGraph,
    strategy: VersioningStrategy,
    entries: ReadonlyMap<number, PlanEntry>,
    conflicts: ConflictLog,
    sha: string | undefined,
    now: Date
  ): Map<number, string> {
    const versions = new Map<number, string>();
    for (const [index, entry] of Array.from(entries).sort(([a], [b]) => a - b)) {
      const node = graph.nodes[index];
      if (!node || entry.bump === 'none' || conflicts.has('MIXED_SNAPSHOT', node.name)) continue;
      versions.set(
        index,
        entry.bump === 'snapshot'
          ? renderSnapshotVersion(strategy.snapshotTemplate, node.version, { sha, now })
          : applyBump(node.version, entry.bump)
      );
    }
    return versions;
  }
}

/**
 * Fold a propagated bump into a consumer's entry. A snapshot only meets an
 * ordered bump here when they come from different sources: the package's own
 * snapshot changeset wins, otherwise the ordered bump does.
 */
function resolvePropagated(entry: PlanEntry, candidate: BumpKind): BumpKind {
  const merged = mergeBumps(entry.bump, candidate);
  if (merged.ok) return merged.bump;
  if (entry.own === 'snapshot') return 'snapshot';
  return candidate === 'snapshot' ? entry.bump : candidate;
}

function sortReasons(reasons: readonly BumpReason[]): BumpReason[] {
  return [...reasons].sort((a, b) =>
    REASON_ORDER[a.type] - REASON_ORDER[b.type] || compareStrings(a.source ?? '', b.source ?? '')
  );
}
