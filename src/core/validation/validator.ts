import { minimatch } from 'minimatch';
import semver from 'semver';

import {
  SECTION_BY_KIND,
  type DependencyGraph,
  type EngineConfig,
  type Logger,
  type Severity,
  type ValidationCategory,
  type ValidationIssue,
  type VersionPlan,
  type Workspace
} from '../../types/index.js';
import { throwIfCancelled } from '../../utils/cancellation.js';
import { compareStrings } from '../../utils/compare.js';
import { ValidationError } from '../../utils/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { rangeAdmits } from '../versioning/ranges.js';

export interface ValidatorOptions {
  config: Readonly<EngineConfig>;
  logger?: Logger;
  signal?: AbortSignal;
}

const CATEGORY_ORDER: readonly ValidationCategory[] = [
  'pattern-coverage',
  'graph-acyclicity',
  'version-monotonicity',
  'range-compatibility',
  'external-duplication'
];

export function compareIssues(a: ValidationIssue, b: ValidationIssue): number {
  return (
    CATEGORY_ORDER.indexOf(a.category) - CATEGORY_ORDER.indexOf(b.category) ||
    compareStrings(a.packages.join(','), b.packages.join(',')) ||
    compareStrings(a.message, b.message)
  );
}

export function hasErrors(issues: readonly ValidationIssue[]): boolean {
  return issues.some(issue => issue.severity === 'error');
}

/**
 * Checks a workspace, its graph and optionally a plan. Every check runs;
 * issues are aggregated rather than thrown.
 */
export class Validator {
  private readonly config: Readonly<EngineConfig>;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;

  constructor(options: ValidatorOptions) {
    this.config = options.config;
    this.logger = options.logger ?? defaultLogger;
    this.signal = options.signal;
  }

  validate(workspace: Workspace, graph: DependencyGraph, plan?: VersionPlan): ValidationIssue[] {
    throwIfCancelled(this.signal);
    const issues = [
      ...this.checkPatternCoverage(workspace),
      ...this.checkAcyclicity(graph),
      ...this.checkMonotonicity(plan),
      ...this.checkRangeCompatibility(graph, plan),
      ...this.checkExternalDuplication(graph)
    ].sort(compareIssues);
    this.logger.debug(`Validation produced ${issues.length} issue(s)`);
    return issues;
  }

  /**
   * Like `validate`, but throws a ValidationError when any issue is an error
   */
  assertValid(workspace: Workspace, graph: DependencyGraph, plan?: VersionPlan): ValidationIssue[] {
    const issues = this.validate(workspace, graph, plan);
    if (hasErrors(issues)) {
      throw new ValidationError(issues);
    }
    return issues;
  }

  private issue(
    category: ValidationCategory,
    fallback: Severity,
    message: string,
    packages: string[]
  ): ValidationIssue {
    return {
      severity: this.config.validationSeverity[category] ?? fallback,
      category,
      message,
      packages: [...packages].sort(compareStrings)
    };
  }

  private checkPatternCoverage(workspace: Workspace): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const orphan of workspace.orphans) {
      const label = orphan.name ? `${orphan.relativePath} (${orphan.name})` : orphan.relativePath;
      issues.push(this.issue(
        'pattern-coverage',
        'error',
        `Manifest ${label} is outside every workspace pattern`,
        orphan.name ? [orphan.name] : []
      ));
    }

    for (const pkg of workspace.packages) {
      const covered = workspace.patterns.some(pattern => minimatch(pkg.relativePath, pattern.pattern))
        && !workspace.excludes.some(exclude => minimatch(pkg.relativePath, exclude));
      if (covered) continue;
      // Packages reached through a path dependency are referenced explicitly
      const fallback: Severity = pkg.discoveredVia === 'path-alias' ? 'warning' : 'error';
      issues.push(this.issue(
        'pattern-coverage',
        fallback,
        `Package ${pkg.name} at ${pkg.relativePath} is not matched by any workspace pattern`,
        [pkg.name]
      ));
    }
    return issues;
  }

  private checkAcyclicity(graph: DependencyGraph): ValidationIssue[] {
    return graph.cycles.map(cycle => this.issue(
      'graph-acyclicity',
      'error',
      `Dependency cycle: ${cycle.join(' -> ')} -> ${cycle[0] ?? ''}`,
      cycle
    ));
  }

  private checkMonotonicity(plan: VersionPlan | undefined): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const step of plan?.steps ?? []) {
      const valid = semver.valid(step.newVersion) !== null && semver.valid(step.currentVersion) !== null;
      if (valid && semver.gt(step.newVersion, step.currentVersion)) continue;
      issues.push(this.issue(
        'version-monotonicity',
        'error',
        `${step.package} would move from ${step.currentVersion} to ${step.newVersion}, which is not an increase`,
        [step.package]
      ));
    }
    return issues;
  }

  private checkRangeCompatibility(graph: DependencyGraph, plan: VersionPlan | undefined): ValidationIssue[] {
    const planned = new Map((plan?.steps ?? []).map(step => [step.package, step.newVersion]));
    const edits = (plan?.steps ?? []).flatMap(step => step.edits);
    const issues: ValidationIssue[] = [];

    for (const edge of graph.edges) {
      const consumer = graph.nodes[edge.from];
      const dependency = graph.nodes[edge.to];
      if (!consumer || !dependency) continue;

      const version = planned.get(dependency.name) ?? dependency.version;
      if (rangeAdmits(edge.range, version)) continue;

      const section = SECTION_BY_KIND[edge.kind];
      const covered = edits.some(edit =>
        edit.package === consumer.name &&
        edit.field === section &&
        edit.dependency === dependency.name &&
        rangeAdmits(edit.to, version)
      );
      if (covered) continue;

      issues.push(this.issue(
        'range-compatibility',
        'error',
        `${consumer.name} declares ${dependency.name}@${edge.range} in ${section}, which does not admit ${version}`,
        [consumer.name, dependency.name]
      ));
    }
    return issues;
  }

  private checkExternalDuplication(graph: DependencyGraph): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    for (const external of graph.externals) {
      const ranges = new Set(external.references.map(reference => reference.range));
      if (ranges.size < 2) continue;
      const detail = external.references
        .map(reference => `${reference.range} (${reference.from})`)
        .join(', ');
      issues.push(this.issue(
        'external-duplication',
        'warning',
        `${external.name} is declared with divergent ranges: ${detail}`,
        Array.from(new Set(external.references.map(reference => reference.from)))
      ));
    }
    return issues;
  }
}
