/**
 * Shared fixtures: in-memory workspaces, fixed clocks and deterministic ids
 */

import { MemoryFileProvider } from '../src/core/ports/memory-file-provider.js';
import { JsonManifestProvider } from '../src/core/ports/json-manifest-provider.js';
import type { VcsProvider } from '../src/core/ports/vcs-provider.js';
import { ChangesetIdGenerator } from '../src/core/changesets/changeset-id.js';
import { ConsoleLogger } from '../src/utils/logger.js';
import { WorkspaceDiscoverer } from '../src/core/discovery/workspace-discoverer.js';
import { GraphBuilder } from '../src/core/graph/graph-builder.js';
import { resolveEngineConfig } from '../src/core/config.js';
import {
  LogLevel,
  type ChangedFile,
  type DependencyGraph,
  type EdgeKind,
  type EngineConfig,
  type Workspace,
  type WorkspacePackage
} from '../src/types/index.js';

export const ROOT = '/repo';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

/** Logger that only reports errors, keeping test output quiet */
export const quietLogger = new ConsoleLogger(LogLevel.ERROR);

export interface ManifestSpec {
  name?: string;
  version?: string;
  private?: boolean;
  workspaces?: string[];
  dependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
  optionalDependencies?: Record<string, string>;
}

export function manifestText(spec: ManifestSpec): string {
  return `${JSON.stringify(spec, null, 2)}\n`;
}

/**
 * Workspace under /repo with one manifest per entry, keyed by directory
 * relative to the root. The root manifest declares `packages/*` unless given.
 */
export function memoryWorkspace(
  packages: Record<string, ManifestSpec>,
  rootManifest: ManifestSpec = { name: 'root', private: true, workspaces: ['packages/*'] }
): MemoryFileProvider {
  const files = new MemoryFileProvider({ [`${ROOT}/package.json`]: manifestText(rootManifest) });
  for (const [dir, spec] of Object.entries(packages)) {
    files.setFile(`${ROOT}/${dir}/package.json`, manifestText(spec));
  }
  return files;
}

export const manifests = new JsonManifestProvider();

/** Ids `000000001-0000-000001`, `000000001-0001-000002`, ... in creation order */
export function sequentialIds(): ChangesetIdGenerator {
  let random = 0;
  return new ChangesetIdGenerator({
    clock: () => 1,
    random: () => {
      random++;
      return random.toString(16).padStart(6, '0');
    }
  });
}

/**
 * Version control stand-in returning canned changes
 */
export class FakeVcs implements VcsProvider {
  calls: Array<{ from: string; to?: string }> = [];

  constructor(private readonly changes: ChangedFile[] = [], private readonly revision = 'abc123def4567890') {}

  async currentRevision(): Promise<string> {
    return this.revision;
  }

  async currentBranch(): Promise<string> {
    return 'main';
  }

  async changedFiles(from: string, to?: string): Promise<ChangedFile[]> {
    this.calls.push(to === undefined ? { from } : { from, to });
    return this.changes;
  }
}

/**
 * Workspace package record for graph-level tests. Dependencies are
 * `[target, range, kind?]` tuples; kind defaults to runtime.
 */
export function workspacePackage(
  name: string,
  version: string,
  dependencies: Array<[string, string, EdgeKind?]> = []
): WorkspacePackage {
  const relativePath = `packages/${name}`;
  return {
    name,
    version,
    private: false,
    root: `${ROOT}/${relativePath}`,
    manifestPath: `${ROOT}/${relativePath}/package.json`,
    relativePath,
    dependencies: dependencies.map(([to, range, kind]) => ({ from: name, to, range, kind: kind ?? 'runtime' })),
    discoveredVia: 'pattern'
  };
}

/**
 * Discover an in-memory workspace and build its graph
 */
export async function loadWorkspace(
  files: MemoryFileProvider,
  config: Readonly<EngineConfig> = resolveEngineConfig({})
): Promise<{ workspace: Workspace; graph: DependencyGraph }> {
  const workspace = await new WorkspaceDiscoverer({ files, manifests, config, logger: quietLogger }).discover(ROOT);
  return { workspace, graph: new GraphBuilder({ logger: quietLogger }).build(workspace.packages) };
}
