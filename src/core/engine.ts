/**
 * Engine facade
 *
 * Wires the providers, configuration, logger and cancellation signal into the
 * discoverer, graph builder, attributor, changeset store, planner and
 * validator. Every operation re-reads the workspace from disk.
 */

import { resolve } from 'path';

import type { FileProvider } from './ports/file-provider.js';
import type { ManifestProvider } from './ports/manifest-provider.js';
import type { VcsProvider } from './ports/vcs-provider.js';
import { NodeFileProvider } from './ports/node-file-provider.js';
import { JsonManifestProvider } from './ports/json-manifest-provider.js';
import type {
  ChangeAttribution,
  ChangedFile,
  Changeset,
  ConflictMode,
  DependencyGraph,
  EngineConfig,
  Logger,
  ValidationIssue,
  VersionPlan,
  Workspace,
  WorkspacePattern
} from '../types/index.js';
import { throwIfCancelled } from '../utils/cancellation.js';
import { ConfigError, ValidationError } from '../utils/errors.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { resolveEngineConfig } from './config.js';
import { WorkspaceDiscoverer } from './discovery/workspace-discoverer.js';
import { GraphBuilder } from './graph/graph-builder.js';
import { ChangeAttributor, type AttributionOptions } from './changes/change-attributor.js';
import { ChangesetStore } from './changesets/changeset-store.js';
import type { ChangesetIdGenerator } from './changesets/changeset-id.js';
import { VersionPlanner, type VersioningStrategy } from './planning/version-planner.js';
import { applyVersionPlan } from './planning/manifest-edits.js';
import { Validator, hasErrors } from './validation/validator.js';

export interface EngineOptions {
  root: string;
  config?: Readonly<EngineConfig>;
  files?: FileProvider;
  manifests?: ManifestProvider;
  vcs?: VcsProvider;
  logger?: Logger;
  signal?: AbortSignal;
  ids?: ChangesetIdGenerator;
  now?: () => Date;
}

export interface WorkspaceSnapshot {
  workspace: Workspace;
  graph: DependencyGraph;
}

export interface AffectedOptions extends AttributionOptions {
  /** Base revision */
  since: string;
  /** Head revision; staged and working-tree changes when omitted */
  until?: string;
}

export interface EnginePlanOptions {
  strategy?: Partial<VersioningStrategy>;
  conflictMode?: ConflictMode;
  /** Seed affected packages from the changes since this revision */
  since?: string;
  attribution?: AttributionOptions;
  /** Revision identifier for snapshot versions; read from version control when omitted */
  sha?: string;
}

export interface PlanResult extends WorkspaceSnapshot {
  plan: VersionPlan;
  issues: ValidationIssue[];
}

export interface VersionResult extends PlanResult {
  /** Manifest paths rewritten */
  written: string[];
  /** Changesets marked applied */
  applied: Changeset[];
}

export class MonoversionEngine {
  readonly root: string;
  readonly config: Readonly<EngineConfig>;
  readonly store: ChangesetStore;
  private readonly files: FileProvider;
  private readonly manifests: ManifestProvider;
  private readonly vcs?: VcsProvider;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;
  private readonly now: () => Date;
  private readonly discoverer: WorkspaceDiscoverer;
  private readonly graphBuilder: GraphBuilder;
  private readonly attributor: ChangeAttributor;
  private readonly planner: VersionPlanner;
  private readonly validator: Validator;

  constructor(options: EngineOptions) {
    this.root = resolve(options.root);
    this.config = options.config ?? resolveEngineConfig({});
    this.files = options.files ?? new NodeFileProvider();
    this.manifests = options.manifests ?? new JsonManifestProvider();
    this.vcs = options.vcs;
    this.logger = options.logger ?? defaultLogger;
    this.signal = options.signal;
    this.now = options.now ?? (() => new Date());

    const shared = { config: this.config, logger: this.logger, signal: this.signal };
    this.discoverer = new WorkspaceDiscoverer({ ...shared, files: this.files, manifests: this.manifests });
    this.graphBuilder = new GraphBuilder({ logger: this.logger });
    this.attributor = new ChangeAttributor({ ...shared, vcs: this.vcs });
    this.planner = new VersionPlanner(shared);
    this.validator = new Validator(shared);
    this.store = new ChangesetStore({
      ...shared,
      root: this.root,
      files: this.files,
      ids: options.ids,
      now: this.now
    });
  }

  async discover(patterns?: WorkspacePattern[]): Promise<Workspace> {
    return this.discoverer.discover(this.root, patterns);
  }

  buildGraph(workspace: Workspace): DependencyGraph {
    throwIfCancelled(this.signal);
    return this.graphBuilder.build(workspace.packages);
  }

  async snapshot(): Promise<WorkspaceSnapshot> {
    const workspace = await this.discover();
    return { workspace, graph: this.buildGraph(workspace) };
  }

  /**
   * Attribute an explicit list of changed files
   */
  async attributeFiles(files: ReadonlyArray<string | ChangedFile>, options: AttributionOptions = {}): Promise<ChangeAttribution> {
    const { workspace, graph } = await this.snapshot();
    return this.attributor.attribute(workspace, graph, files, options);
  }

  /**
   * Packages affected by the changes between two revisions
   */
  async affected(options: AffectedOptions): Promise<ChangeAttribution> {
    const { workspace, graph } = await this.snapshot();
    return this.attributor.attributeRevisions(workspace, graph, options.since, options.until, options);
  }

  /**
   * Build a plan from the pending changesets and validate it
   */
  async plan(options: EnginePlanOptions = {}): Promise<PlanResult> {
    const { workspace, graph } = await this.snapshot();
    const changesets = await this.store.pending();
    throwIfCancelled(this.signal);

    const attribution = options.since === undefined
      ? undefined
      : await this.attributor.attributeRevisions(workspace, graph, options.since, undefined, options.attribution);

    const template = options.strategy?.snapshotTemplate ?? this.config.snapshotTemplate;
    const wantsSnapshot = changesets.some(changeset => changeset.bump === 'snapshot') || this.config.defaultBump === 'snapshot';
    let sha = options.sha;
    if (sha === undefined && wantsSnapshot && template.includes('{sha}')) {
      if (!this.vcs) {
        throw new ConfigError('Snapshot versions need a revision identifier but no version-control provider is configured');
      }
      sha = (await this.vcs.currentRevision()).slice(0, 12);
      throwIfCancelled(this.signal);
    }

    const plan = this.planner.plan(workspace, graph, {
      changesets,
      attribution,
      strategy: options.strategy,
      conflictMode: options.conflictMode,
      sha,
      now: this.now()
    });
    const issues = this.validator.validate(workspace, graph, plan);
    return { workspace, graph, plan, issues };
  }

  async validate(): Promise<ValidationIssue[]> {
    const { workspace, graph } = await this.snapshot();
    return this.validator.validate(workspace, graph);
  }

  /**
   * Plan, refuse on validation errors, rewrite manifests and mark the
   * consumed changesets applied, all under the changeset store lock
   */
  async version(options: EnginePlanOptions = {}): Promise<VersionResult> {
    return this.store.withLock(async () => {
      const result = await this.plan(options);
      if (hasErrors(result.issues)) {
        throw new ValidationError(result.issues);
      }

      const written = await applyVersionPlan(result.plan, {
        files: this.files,
        manifests: this.manifests,
        logger: this.logger,
        signal: this.signal
      });

      const applied: Changeset[] = [];
      for (const id of result.plan.changesets) {
        applied.push(await this.store.markApplied(id));
      }
      this.logger.info(`Versioned ${result.plan.steps.length} package(s), consumed ${applied.length} changeset(s)`);
      return { ...result, written, applied };
    });
  }
}
