import type {
  BumpReason,
  ChangeAttribution,
  Changeset,
  DependencyGraph,
  Diagnostic,
  ManifestEdit,
  ValidationIssue,
  VersionPlan
} from '../types/index.js';

/**
 * Plain-text renderings shared by the commands. Every function returns the
 * text without a trailing newline.
 */

function listOrNone(names: readonly string[]): string {
  return names.length > 0 ? names.join(', ') : '(none)';
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

export function formatAttribution(attribution: ChangeAttribution): string {
  const lines = [
    `Directly affected: ${listOrNone(attribution.directlyAffected)}`,
    `Transitively affected: ${listOrNone(attribution.transitivelyAffected)}`
  ];
  if (attribution.rootLevelChanges.length > 0) {
    lines.push(`Root-level changes: ${attribution.rootLevelChanges.join(', ')}`);
  }
  for (const pkg of attribution.packages) {
    lines.push('', `${pkg.package} (significance ${pkg.significance}, suggests ${pkg.maxBumpSuggestion})`);
    for (const file of pkg.files) {
      lines.push(`  ${file.path} [${file.category}]`);
    }
  }
  return lines.join('\n');
}

export function formatGraph(graph: DependencyGraph): string {
  const lines = [
    `${plural(graph.nodes.length, 'package')}, ${plural(graph.edges.length, 'internal edge')}, ${plural(graph.externals.length, 'external dependency', 'external dependencies')}`,
    `Order: ${listOrNone(graph.order)}`
  ];

  for (const node of graph.nodes) {
    lines.push(`${node.name}@${node.version}`);
    for (const edge of graph.edges) {
      if (edge.from !== node.index) continue;
      const target = graph.nodes[edge.to];
      lines.push(`  -> ${target ? target.name : '?'} ${edge.range} (${edge.kind})`);
    }
  }

  if (graph.cycles.length > 0) {
    lines.push('Cycles:');
    for (const cycle of graph.cycles) {
      lines.push(`  ${[...cycle, cycle[0] ?? ''].join(' -> ')}`);
    }
  }
  return lines.join('\n');
}

function formatReason(reason: BumpReason): string {
  switch (reason.type) {
    case 'changeset':
      return `changeset ${reason.source ?? '?'}`;
    case 'affected':
      return 'affected by changes';
    case 'propagation':
      return `depends on ${reason.source ?? '?'}`;
    case 'range':
      return `range of ${reason.source ?? '?'}`;
  }
}

export function formatEdit(edit: ManifestEdit): string {
  const field = edit.dependency === undefined ? edit.field : `${edit.field}.${edit.dependency}`;
  return `${edit.package} ${field}: ${edit.from} -> ${edit.to}`;
}

export function formatPlan(plan: VersionPlan): string {
  if (plan.steps.length === 0) {
    return 'Nothing to version';
  }
  const lines = [`Version plan (${plural(plan.steps.length, 'package')}, ${plural(plan.changesets.length, 'changeset')}):`];
  plan.steps.forEach((step, position) => {
    const reasons = step.reasons.map(formatReason).join('; ');
    lines.push(`${position + 1}. ${step.package} ${step.currentVersion} -> ${step.newVersion} (${step.bump}) [${reasons}]`);
    for (const edit of step.edits) {
      lines.push(`   ${formatEdit(edit)}`);
    }
  });
  return lines.join('\n');
}

export function formatDiagnostic(diagnostic: Diagnostic | ValidationIssue): string {
  const scope = diagnostic.packages.length > 0 ? ` [${diagnostic.packages.join(', ')}]` : '';
  return `${diagnostic.severity}: ${diagnostic.category}: ${diagnostic.message}${scope}`;
}

export function formatIssues(issues: readonly ValidationIssue[]): string {
  if (issues.length === 0) {
    return 'No issues found';
  }
  const errors = issues.filter(issue => issue.severity === 'error').length;
  const lines = issues.map(formatDiagnostic);
  lines.push(`${plural(errors, 'error')}, ${plural(issues.length - errors, 'warning')}`);
  return lines.join('\n');
}

export function formatChangeset(changeset: Changeset): string {
  const environments = changeset.environments.length > 0 ? changeset.environments.join(',') : '-';
  const production = changeset.productionDeployment ? ' production' : '';
  return `${changeset.id} ${changeset.package} ${changeset.bump} ${changeset.status} (${changeset.author}, ${environments}${production}) ${changeset.description}`;
}

export function formatChangesets(changesets: readonly Changeset[]): string {
  if (changesets.length === 0) {
    return 'No changesets';
  }
  return changesets.map(formatChangeset).join('\n');
}
