import { join, resolve } from 'path';
import { minimatch } from 'minimatch';
import semver from 'semver';

import type { FileProvider } from '../ports/file-provider.js';
import type { ManifestProvider } from '../ports/manifest-provider.js';
import {
  EDGE_KINDS,
  ErrorCodes,
  type DependencyEdge,
  type EngineConfig,
  type Logger,
  type OrphanManifest,
  type Workspace,
  type WorkspacePackage,
  type WorkspacePattern
} from '../../types/index.js';
import { throwIfCancelled } from '../../utils/cancellation.js';
import { compareStrings, sortedUnique } from '../../utils/compare.js';
import { WorkspaceError } from '../../utils/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { ancestorsOf, relativePosix, toPosixPath } from '../../utils/paths.js';
import { pathSpecifierTarget } from '../versioning/ranges.js';

export interface WorkspaceDiscovererOptions {
  files: FileProvider;
  manifests: ManifestProvider;
  config: Readonly<EngineConfig>;
  logger?: Logger;
  signal?: AbortSignal;
}

interface PackageRecord {
  pkg: WorkspacePackage;
  pattern: string | null;
}

const MATCH_OPTIONS = { dot: false } as const;

/**
 * Highest-priority patterns first; declared order breaks ties.
 */
export function orderPatterns(patterns: WorkspacePattern[]): WorkspacePattern[] {
  return patterns
    .map((pattern, index) => ({ pattern: { ...pattern, pattern: toPosixPath(pattern.pattern) }, index }))
    .sort((a, b) => (b.pattern.priority ?? 0) - (a.pattern.priority ?? 0) || a.index - b.index)
    .map(entry => entry.pattern);
}

/**
 * Directory depth a pattern can reach; unlimited with a globstar
 */
function patternDepth(pattern: string): number {
  if (pattern.includes('**')) return Infinity;
  return pattern.split('/').filter(segment => segment.length > 0).length;
}

function matchesAny(path: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => minimatch(path, pattern, MATCH_OPTIONS));
}

function isUnder(path: string, roots: ReadonlySet<string>): boolean {
  return ancestorsOf(path).some(ancestor => roots.has(ancestor));
}

/**
 * Expands workspace patterns into the set of Internal packages.
 */
export class WorkspaceDiscoverer {
  private readonly files: FileProvider;
  private readonly manifests: ManifestProvider;
  private readonly config: Readonly<EngineConfig>;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;

  constructor(options: WorkspaceDiscovererOptions) {
    this.files = options.files;
    this.manifests = options.manifests;
    this.config = options.config;
    this.logger = options.logger ?? defaultLogger;
    this.signal = options.signal;
  }

  /**
   * Discover the workspace rooted at `root`. Explicit patterns take precedence
   * over the configuration, which takes precedence over the root manifest.
   */
  async discover(root: string, explicitPatterns?: WorkspacePattern[]): Promise<Workspace> {
    const workspaceRoot = resolve(root);
    const rootManifestPath = join(workspaceRoot, this.manifests.fileName);
    throwIfCancelled(this.signal);

    if (!(await this.files.exists(rootManifestPath))) {
      throw new WorkspaceError(
        `No ${this.manifests.fileName} found at workspace root ${workspaceRoot}`,
        ErrorCodes.NO_ROOT_MANIFEST,
        { path: rootManifestPath }
      );
    }
    const rootManifest = this.manifests.parse(await this.files.readText(rootManifestPath), rootManifestPath);
    throwIfCancelled(this.signal);

    const declared = (rootManifest.workspaces ?? []).map(toPosixPath);
    const excludes = declared.filter(entry => entry.startsWith('!')).map(entry => toPosixPath(entry.slice(1)));
    const source = explicitPatterns && explicitPatterns.length > 0
      ? explicitPatterns
      : this.config.workspacePatterns.length > 0
        ? this.config.workspacePatterns
        : declared.filter(entry => !entry.startsWith('!')).map(pattern => ({ pattern }));
    const patterns = orderPatterns(source);
    this.logger.debug(`Discovering workspace ${workspaceRoot}`, { patterns: patterns.map(p => p.pattern), excludes });

    const byPath = new Map<string, PackageRecord>();
    for (const pattern of patterns) {
      await this.expandPattern(workspaceRoot, pattern, excludes, byPath);
    }

    await this.resolvePathAliases(workspaceRoot, byPath);

    const packages = this.assemblePackages(byPath);
    const orphans = await this.findOrphans(workspaceRoot, byPath, patterns, excludes);
    if (orphans.length > 0) {
      if (this.config.strictCoverage) {
        throw new WorkspaceError(
          `Manifest(s) outside every workspace pattern: ${orphans.map(orphan => orphan.relativePath).join(', ')}`,
          ErrorCodes.PATTERN_COVERAGE,
          { orphans: orphans.map(orphan => orphan.relativePath) }
        );
      }
      this.logger.warn(`Found ${orphans.length} manifest(s) outside the workspace patterns`);
    }

    const declaredDependencyNames = sortedUnique(
      packages.flatMap(pkg => pkg.dependencies.map(edge => edge.to))
    );
    this.logger.debug(`Discovered ${packages.length} package(s)`);

    return {
      root: workspaceRoot,
      rootManifestPath,
      patterns,
      excludes,
      packages,
      declaredDependencyNames,
      orphans
    };
  }

  private async expandPattern(
    root: string,
    pattern: WorkspacePattern,
    excludes: string[],
    byPath: Map<string, PackageRecord>
  ): Promise<void> {
    const exclude = [...excludes, ...(pattern.exclude ?? [])];
    const include = pattern.include ?? [];
    // Subtrees of packages found by earlier patterns are never searched
    const earlierRoots = new Set(byPath.keys());
    const entries = await this.files.walk(root, {
      directoriesOnly: true,
      followSymlinks: pattern.followSymlinks ?? false,
      maxDepth: Math.min(pattern.maxDepth ?? Infinity, patternDepth(pattern.pattern)),
      filter: entry => !matchesAny(entry.path, exclude) && !isUnder(entry.path, earlierRoots)
    });
    throwIfCancelled(this.signal);

    const matchedRoots = new Set<string>();
    for (const entry of entries) {
      if (isUnder(entry.path, matchedRoots)) continue;
      if (!minimatch(entry.path, pattern.pattern, MATCH_OPTIONS)) continue;
      if (include.length > 0 && !matchesAny(entry.path, include)) continue;

      const manifestPath = join(root, entry.path, this.manifests.fileName);
      const hasManifest = await this.files.exists(manifestPath);
      throwIfCancelled(this.signal);
      if (!hasManifest) continue;

      matchedRoots.add(entry.path);
      const existing = byPath.get(entry.path);
      if (existing) {
        if (!pattern.overrideDetection) {
          throw new WorkspaceError(
            `Directory ${entry.path} is matched by both "${existing.pattern ?? '(path alias)'}" and "${pattern.pattern}"`,
            ErrorCodes.DUPLICATE_PACKAGE_NAME,
            { path: entry.path, packages: [existing.pkg.name] }
          );
        }
        this.logger.debug(`Pattern "${pattern.pattern}" overrides detection of ${entry.path}`);
      }
      byPath.set(entry.path, await this.readPackage(root, entry.path, pattern.pattern));
    }
  }

  private async readPackage(root: string, relativePath: string, pattern: string | null): Promise<PackageRecord> {
    const packageRoot = join(root, relativePath);
    const manifestPath = join(packageRoot, this.manifests.fileName);
    const manifest = this.manifests.parse(await this.files.readText(manifestPath), manifestPath);
    throwIfCancelled(this.signal);

    if (!manifest.name) {
      throw new WorkspaceError(`Malformed manifest ${manifestPath}: missing "name"`, ErrorCodes.MANIFEST_PARSE, { path: manifestPath });
    }
    if (!manifest.version || semver.valid(manifest.version) === null) {
      throw new WorkspaceError(
        `Malformed manifest ${manifestPath}: "version" must be a semantic version`,
        ErrorCodes.MANIFEST_PARSE,
        { path: manifestPath, packageName: manifest.name }
      );
    }

    const name = manifest.name;
    const dependencies: DependencyEdge[] = [];
    for (const kind of EDGE_KINDS) {
      for (const [to, range] of Object.entries(manifest.dependencies[kind]).sort(([a], [b]) => compareStrings(a, b))) {
        dependencies.push({ from: name, to, range, kind });
      }
    }

    return {
      pattern,
      pkg: {
        name,
        version: manifest.version,
        private: manifest.private,
        root: packageRoot,
        manifestPath,
        relativePath,
        dependencies,
        discoveredVia: pattern === null ? 'path-alias' : 'pattern'
      }
    };
  }

  /**
   * Point file:/link:/portal: edges at the package living in the target
   * directory, adding packages reached only this way.
   */
  private async resolvePathAliases(root: string, byPath: Map<string, PackageRecord>): Promise<void> {
    const queue = Array.from(byPath.keys()).sort(compareStrings);
    while (queue.length > 0) {
      const current = queue.shift();
      const record = current === undefined ? undefined : byPath.get(current);
      if (!record) continue;

      for (const edge of record.pkg.dependencies) {
        const target = pathSpecifierTarget(edge.range);
        if (target === null) continue;

        const relativePath = relativePosix(root, resolve(record.pkg.root, target));
        if (relativePath === null || relativePath === '') {
          this.logger.debug(`Path dependency ${edge.to} of ${edge.from} points outside the workspace`, { range: edge.range });
          continue;
        }

        let aliased = byPath.get(relativePath);
        if (!aliased) {
          const manifestPath = join(root, relativePath, this.manifests.fileName);
          if (!(await this.files.exists(manifestPath))) {
            this.logger.debug(`Path dependency ${edge.to} of ${edge.from} has no manifest`, { range: edge.range });
            continue;
          }
          aliased = await this.readPackage(root, relativePath, null);
          byPath.set(relativePath, aliased);
          queue.push(relativePath);
        }
        edge.to = aliased.pkg.name;
      }
    }
  }

  private assemblePackages(byPath: Map<string, PackageRecord>): WorkspacePackage[] {
    const byName = new Map<string, WorkspacePackage>();
    for (const { pkg } of byPath.values()) {
      const existing = byName.get(pkg.name);
      if (existing) {
        const paths = [existing.relativePath, pkg.relativePath].sort(compareStrings);
        throw new WorkspaceError(
          `Duplicate package name "${pkg.name}" declared by ${paths.join(' and ')}`,
          ErrorCodes.DUPLICATE_PACKAGE_NAME,
          { packageName: pkg.name, paths }
        );
      }
      byName.set(pkg.name, pkg);
    }
    return Array.from(byName.values()).sort((a, b) => compareStrings(a.name, b.name));
  }

  private async findOrphans(
    root: string,
    byPath: Map<string, PackageRecord>,
    patterns: WorkspacePattern[],
    excludes: string[]
  ): Promise<OrphanManifest[]> {
    const packageRoots = new Set(byPath.keys());
    const deliberate = [...excludes, ...patterns.flatMap(pattern => pattern.exclude ?? [])];
    const entries = await this.files.walk(root, {
      filter: entry => !entry.isDirectory || (!packageRoots.has(entry.path) && !matchesAny(entry.path, deliberate))
    });
    throwIfCancelled(this.signal);

    const orphans: OrphanManifest[] = [];
    for (const entry of entries) {
      if (entry.isDirectory) continue;
      const segments = entry.path.split('/');
      if (segments.length < 2 || segments[segments.length - 1] !== this.manifests.fileName) continue;

      const relativePath = segments.slice(0, -1).join('/');
      if (matchesAny(relativePath, deliberate)) continue;
      const manifestPath = join(root, entry.path);
      let name: string | undefined;
      try {
        name = this.manifests.parse(await this.files.readText(manifestPath), manifestPath).name;
      } catch (error) {
        this.logger.debug(`Unreadable orphan manifest ${manifestPath}`, error);
      }
      orphans.push(name === undefined ? { relativePath, manifestPath } : { relativePath, manifestPath, name });
    }
    return orphans;
  }
}
