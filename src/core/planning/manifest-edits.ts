import type { FileProvider } from '../ports/file-provider.js';
import type { ManifestFieldUpdate, ManifestProvider } from '../ports/manifest-provider.js';
import {
  ErrorCodes,
  KIND_BY_SECTION,
  SECTION_BY_KIND,
  type DependencyGraph,
  type GraphEdge,
  type Logger,
  type ManifestEdit,
  type VersionPlan,
  type WorkspacePackage
} from '../../types/index.js';
import { throwIfCancelled } from '../../utils/cancellation.js';
import { compareStrings } from '../../utils/compare.js';
import { WorkspaceError } from '../../utils/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { rangeAdmits, widenRange } from '../versioning/ranges.js';

export interface RangeEditResult {
  edits: ManifestEdit[];
  /** Consumers whose range cannot be widened to admit the new version */
  incompatible: Array<{ consumer: string; range: string }>;
}

/**
 * Range edits required in consumers of `dependency` once it moves to
 * `newVersion`, given the edges pointing at it. Edits are sorted by consumer,
 * section and dependency name.
 */
export function computeRangeEdits(
  graph: DependencyGraph,
  packages: ReadonlyMap<string, WorkspacePackage>,
  dependency: number,
  incoming: readonly GraphEdge[],
  newVersion: string
): RangeEditResult {
  const target = graph.nodes[dependency];
  const result: RangeEditResult = { edits: [], incompatible: [] };
  if (!target) return result;

  for (const edge of incoming) {
    if (edge.to !== dependency || rangeAdmits(edge.range, newVersion)) continue;
    const consumer = graph.nodes[edge.from];
    const consumerPackage = consumer ? packages.get(consumer.name) : undefined;
    if (!consumer || !consumerPackage) continue;

    const widened = widenRange(edge.range, newVersion);
    if (widened === null) {
      result.incompatible.push({ consumer: consumer.name, range: edge.range });
      continue;
    }
    result.edits.push({
      package: consumer.name,
      manifestPath: consumerPackage.manifestPath,
      field: SECTION_BY_KIND[edge.kind],
      dependency: target.name,
      from: edge.range,
      to: widened
    });
  }

  result.edits.sort((a, b) =>
    compareStrings(a.package, b.package) ||
    compareStrings(a.field, b.field) ||
    compareStrings(a.dependency ?? '', b.dependency ?? '')
  );
  return result;
}

function toUpdate(edit: ManifestEdit): ManifestFieldUpdate {
  if (edit.field === 'version') {
    return { path: ['version'], value: edit.to };
  }
  return { path: [edit.field, edit.dependency ?? ''], value: edit.to };
}

export interface ApplyPlanOptions {
  files: FileProvider;
  manifests: ManifestProvider;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Write every manifest edit of a plan. All manifests are checked against the
 * plan's `from` values before anything is written, and cancellation is only
 * honoured up to that point. A failed write restores the manifests already
 * written. Returns the written paths in first-edit order.
 */
export async function applyVersionPlan(plan: VersionPlan, options: ApplyPlanOptions): Promise<string[]> {
  const log = options.logger ?? defaultLogger;
  const grouped = new Map<string, ManifestEdit[]>();
  for (const step of plan.steps) {
    for (const edit of step.edits) {
      const edits = grouped.get(edit.manifestPath) ?? [];
      edits.push(edit);
      grouped.set(edit.manifestPath, edits);
    }
  }

  const rewritten: Array<{ path: string; original: string; content: string }> = [];
  for (const [path, edits] of grouped) {
    throwIfCancelled(options.signal);
    const text = await options.files.readText(path);
    throwIfCancelled(options.signal);
    const manifest = options.manifests.parse(text, path);

    for (const edit of edits) {
      const current = edit.field === 'version'
        ? manifest.version
        : manifest.dependencies[KIND_BY_SECTION[edit.field]][edit.dependency ?? ''];
      if (current !== edit.from) {
        throw new WorkspaceError(
          `Manifest ${path} changed since the plan was built: expected ${edit.field}${edit.dependency ? `.${edit.dependency}` : ''} to be "${edit.from}", found "${current ?? '(missing)'}"`,
          ErrorCodes.STALE_MANIFEST,
          { path, packageName: edit.package }
        );
      }
    }
    rewritten.push({ path, original: text, content: options.manifests.update(text, edits.map(toUpdate)) });
  }

  throwIfCancelled(options.signal);
  const written: typeof rewritten = [];
  try {
    for (const entry of rewritten) {
      await options.files.writeTextAtomic(entry.path, entry.content);
      written.push(entry);
      log.debug(`Updated ${entry.path}`);
    }
  } catch (error) {
    await restoreManifests(options.files, written, log);
    throw error;
  }
  return rewritten.map(entry => entry.path);
}

async function restoreManifests(
  files: FileProvider,
  written: ReadonlyArray<{ path: string; original: string }>,
  log: Logger
): Promise<void> {
  for (const { path, original } of [...written].reverse()) {
    try {
      await files.writeTextAtomic(path, original);
      log.warn(`Restored ${path} after a failed write`);
    } catch (restoreError) {
      log.error(`Could not restore ${path}`, restoreError);
    }
  }
}
