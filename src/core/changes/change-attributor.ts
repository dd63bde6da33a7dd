import { isAbsolute } from 'path';

import type { VcsProvider } from '../ports/vcs-provider.js';
import type {
  ChangeAttribution,
  ChangedFile,
  DependencyGraph,
  EngineConfig,
  Logger,
  Workspace
} from '../../types/index.js';
import { throwIfCancelled } from '../../utils/cancellation.js';
import { compareStrings, sortedUnique } from '../../utils/compare.js';
import { AttributionError, ConfigError } from '../../utils/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { ancestorsOf, relativePosix, toPosixPath } from '../../utils/paths.js';
import { transitiveDependents } from '../graph/graph-query.js';
import { classifyFile, summarizePackageChanges, type ClassifiedFile } from './file-categories.js';

export interface AttributionOptions {
  /** Root-level changes make every Internal package directly affected */
  includeRootChanges?: boolean;
  /** Fail on any file outside every package */
  strict?: boolean;
}

export interface ChangeAttributorOptions {
  config: Readonly<EngineConfig>;
  vcs?: VcsProvider;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Maps changed files onto the packages that own them.
 */
export class ChangeAttributor {
  private readonly config: Readonly<EngineConfig>;
  private readonly vcs?: VcsProvider;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;

  constructor(options: ChangeAttributorOptions) {
    this.config = options.config;
    this.vcs = options.vcs;
    this.logger = options.logger ?? defaultLogger;
    this.signal = options.signal;
  }

  /**
   * Attribute a list of changed files. Plain strings are workspace-relative
   * paths; renames attribute both their old and new path.
   */
  attribute(
    workspace: Workspace,
    graph: DependencyGraph,
    changes: ReadonlyArray<string | ChangedFile>,
    options: AttributionOptions = {}
  ): ChangeAttribution {
    throwIfCancelled(this.signal);
    const owners = new Map(workspace.packages.map(pkg => [pkg.relativePath, pkg.name]));
    const filesByPackage = new Map<string, ClassifiedFile[]>();
    const rootLevel: string[] = [];

    const record = (pkg: string, path: string, relativeToPackage: string): void => {
      const { category, maxBump } = classifyFile(relativeToPackage, this.config.categoryRules);
      const files = filesByPackage.get(pkg) ?? [];
      files.push({ path, category, maxBump });
      filesByPackage.set(pkg, files);
    };

    for (const path of this.expandPaths(workspace.root, changes)) {
      const owner = ancestorsOf(path).find(candidate => owners.has(candidate));
      const name = owner === undefined ? undefined : owners.get(owner);
      if (owner === undefined || name === undefined) {
        rootLevel.push(path);
        continue;
      }
      record(name, path, path.slice(owner.length + 1));
    }

    const rootLevelChanges = sortedUnique(rootLevel);
    if (rootLevelChanges.length > 0) {
      if (options.strict) {
        throw new AttributionError(
          `File(s) outside every package: ${rootLevelChanges.join(', ')}`,
          { files: rootLevelChanges }
        );
      }
      if (options.includeRootChanges) {
        for (const pkg of workspace.packages) {
          for (const path of rootLevelChanges) {
            record(pkg.name, path, path);
          }
        }
      } else {
        this.logger.debug(`Ignoring ${rootLevelChanges.length} root-level change(s)`, { files: rootLevelChanges });
      }
    }

    const directlyAffected = Array.from(filesByPackage.keys()).sort(compareStrings);
    const packages = directlyAffected.map(pkg =>
      summarizePackageChanges(pkg, filesByPackage.get(pkg) ?? [], this.config.significanceWeights)
    );

    return {
      directlyAffected,
      transitivelyAffected: transitiveDependents(graph, directlyAffected),
      rootLevelChanges,
      packages
    };
  }

  /**
   * Attribute the files changed between two revisions. Without `to`, staged
   * and working-tree changes against `from` are included.
   */
  async attributeRevisions(
    workspace: Workspace,
    graph: DependencyGraph,
    from: string,
    to?: string,
    options: AttributionOptions = {}
  ): Promise<ChangeAttribution> {
    if (!this.vcs) {
      throw new ConfigError('No version-control provider configured');
    }
    throwIfCancelled(this.signal);
    const changes = await this.vcs.changedFiles(from, to);
    throwIfCancelled(this.signal);
    this.logger.debug(`${changes.length} file(s) changed since ${from}${to ? ` up to ${to}` : ''}`);
    return this.attribute(workspace, graph, changes, options);
  }

  private *expandPaths(root: string, changes: ReadonlyArray<string | ChangedFile>): Generator<string> {
    const normalize = (path: string): string => {
      if (isAbsolute(path)) {
        return relativePosix(root, path) ?? toPosixPath(path);
      }
      return toPosixPath(path);
    };
    for (const change of changes) {
      if (typeof change === 'string') {
        yield normalize(change);
        continue;
      }
      yield normalize(change.path);
      if (change.previousPath !== undefined) {
        yield normalize(change.previousPath);
      }
    }
  }
}
