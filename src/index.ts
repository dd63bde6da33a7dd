/**
 * monoversion library entry point
 */

export * from './types/index.js';
export * from './utils/errors.js';
export { ConsoleLogger, logger } from './utils/logger.js';
export * from './core/ports/index.js';
export * from './core/versioning/index.js';
export * from './core/graph/index.js';
export * from './core/changes/index.js';
export * from './core/changesets/index.js';
export * from './core/planning/index.js';
export * from './core/validation/index.js';
export { WorkspaceDiscoverer, orderPatterns, type WorkspaceDiscovererOptions } from './core/discovery/workspace-discoverer.js';
export {
  DEFAULT_CATEGORY_RULES,
  DEFAULT_CONFIG,
  PROPAGATION_POLICIES,
  findConfigFile,
  loadEngineConfig,
  resolveEngineConfig
} from './core/config.js';
export {
  MonoversionEngine,
  type AffectedOptions,
  type EngineOptions,
  type EnginePlanOptions,
  type PlanResult,
  type VersionResult,
  type WorkspaceSnapshot
} from './core/engine.js';
