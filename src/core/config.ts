import { join } from 'path';

import {
  CHANGESET_STORE,
  CONFIG_FILE_NAMES,
  DEFAULT_ENVIRONMENTS,
  DEFAULT_SNAPSHOT_TEMPLATE
} from '../constants/index.js';
import {
  EDGE_KINDS,
  type CategoryRule,
  type EdgeKind,
  type EngineConfig,
  type FileCategory,
  type PropagationPolicy,
  type Severity,
  type ValidationCategory,
  type WorkspacePattern
} from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { isOneOf, isRecord, isStringArray } from '../utils/guards.js';
import { logger } from '../utils/logger.js';
import { isBumpKind } from './versioning/bump.js';
import { validateSnapshotTemplate } from './versioning/snapshot.js';

/**
 * Engine configuration: defaults, validation and loading
 * Supports both JSON and JSONC formats
 */

export const DEFAULT_CATEGORY_RULES: CategoryRule[] = [
  {
    category: 'test',
    patterns: ['**/*.test.*', '**/*.spec.*', '**/__tests__/**', '**/test/**', '**/tests/**'],
    maxBump: 'none'
  },
  {
    category: 'documentation',
    patterns: ['**/*.md', '**/*.mdx', '**/docs/**'],
    maxBump: 'none'
  },
  {
    category: 'configuration',
    patterns: ['**/tsconfig*.json', '**/.eslintrc*', '**/.prettierrc*', '**/*.config.{js,cjs,mjs,ts}'],
    maxBump: 'patch'
  }
];

export const DEFAULT_CONFIG: EngineConfig = {
  workspacePatterns: [],
  strictCoverage: false,
  significanceWeights: {
    source: 80,
    configuration: 70,
    test: 60,
    documentation: 50
  },
  categoryRules: DEFAULT_CATEGORY_RULES,
  defaultBump: 'patch',
  snapshotTemplate: DEFAULT_SNAPSHOT_TEMPLATE,
  propagation: 'default',
  propagateKinds: [...EDGE_KINDS],
  environments: [...DEFAULT_ENVIRONMENTS],
  validationSeverity: {},
  changesetDir: CHANGESET_STORE.DIR,
  changesetFormat: 'yaml'
};

export const PROPAGATION_POLICIES: readonly PropagationPolicy[] = ['conservative', 'default', 'aggressive'];
const CATEGORIES: readonly FileCategory[] = ['source', 'test', 'configuration', 'documentation'];
const VALIDATION_CATEGORIES: readonly ValidationCategory[] = [
  'pattern-coverage',
  'graph-acyclicity',
  'version-monotonicity',
  'range-compatibility',
  'external-duplication'
];

function fail(field: string, reason: string): ConfigError {
  return new ConfigError(`Invalid configuration "${field}": ${reason}`, { field });
}

function optionalNumber(record: Record<string, unknown>, key: string, field: string): number | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw fail(field, 'expected a number');
  }
  return value;
}

function optionalBoolean(record: Record<string, unknown>, key: string, field: string): boolean | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw fail(field, 'expected a boolean');
  }
  return value;
}

function optionalStrings(record: Record<string, unknown>, key: string, field: string): string[] | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  if (!isStringArray(value)) {
    throw fail(field, 'expected a list of strings');
  }
  return value;
}

function parsePattern(value: unknown, index: number): WorkspacePattern {
  const field = `workspacePatterns[${index}]`;
  if (typeof value === 'string') {
    return { pattern: value };
  }
  if (!isRecord(value) || typeof value.pattern !== 'string' || value.pattern.length === 0) {
    throw fail(field, 'expected a glob string or { pattern: string }');
  }
  const pattern: WorkspacePattern = { pattern: value.pattern };
  const priority = optionalNumber(value, 'priority', `${field}.priority`);
  const maxDepth = optionalNumber(value, 'maxDepth', `${field}.maxDepth`);
  const include = optionalStrings(value, 'include', `${field}.include`);
  const exclude = optionalStrings(value, 'exclude', `${field}.exclude`);
  const followSymlinks = optionalBoolean(value, 'followSymlinks', `${field}.followSymlinks`);
  const overrideDetection = optionalBoolean(value, 'overrideDetection', `${field}.overrideDetection`);
  if (priority !== undefined) pattern.priority = priority;
  if (maxDepth !== undefined) {
    if (maxDepth < 1 || !Number.isInteger(maxDepth)) {
      throw fail(`${field}.maxDepth`, 'expected a positive integer');
    }
    pattern.maxDepth = maxDepth;
  }
  if (include !== undefined) pattern.include = include;
  if (exclude !== undefined) pattern.exclude = exclude;
  if (followSymlinks !== undefined) pattern.followSymlinks = followSymlinks;
  if (overrideDetection !== undefined) pattern.overrideDetection = overrideDetection;
  return pattern;
}

function parseCategoryRule(value: unknown, index: number): CategoryRule {
  const field = `categoryRules[${index}]`;
  if (!isRecord(value)) {
    throw fail(field, 'expected an object');
  }
  const { category, patterns, maxBump } = value;
  if (!isOneOf(CATEGORIES, category) || category === 'source') {
    throw fail(`${field}.category`, 'expected test, configuration or documentation');
  }
  if (!isStringArray(patterns)) {
    throw fail(`${field}.patterns`, 'expected a list of strings');
  }
  if (!isBumpKind(maxBump)) {
    throw fail(`${field}.maxBump`, `unknown bump "${String(maxBump)}"`);
  }
  return { category, patterns, maxBump };
}

/**
 * Validate a parsed configuration record and merge it over the defaults.
 * The returned record is frozen.
 */
export function resolveEngineConfig(raw: unknown = {}): Readonly<EngineConfig> {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be an object');
  }
  const config: EngineConfig = {
    ...DEFAULT_CONFIG,
    significanceWeights: { ...DEFAULT_CONFIG.significanceWeights },
    validationSeverity: { ...DEFAULT_CONFIG.validationSeverity }
  };

  if (raw.workspacePatterns !== undefined) {
    if (!Array.isArray(raw.workspacePatterns)) {
      throw fail('workspacePatterns', 'expected a list');
    }
    config.workspacePatterns = raw.workspacePatterns.map((value: unknown, index) => parsePattern(value, index));
  }

  const strictCoverage = optionalBoolean(raw, 'strictCoverage', 'strictCoverage');
  if (strictCoverage !== undefined) config.strictCoverage = strictCoverage;

  if (raw.significanceWeights !== undefined) {
    if (!isRecord(raw.significanceWeights)) {
      throw fail('significanceWeights', 'expected an object');
    }
    for (const [category, weight] of Object.entries(raw.significanceWeights)) {
      if (!isOneOf(CATEGORIES, category)) {
        throw fail(`significanceWeights.${category}`, 'unknown file category');
      }
      if (typeof weight !== 'number' || !Number.isFinite(weight)) {
        throw fail(`significanceWeights.${category}`, 'expected a number');
      }
      config.significanceWeights[category] = weight;
    }
  }

  if (raw.categoryRules !== undefined) {
    if (!Array.isArray(raw.categoryRules)) {
      throw fail('categoryRules', 'expected a list');
    }
    config.categoryRules = raw.categoryRules.map((value: unknown, index) => parseCategoryRule(value, index));
  }

  if (raw.defaultBump !== undefined) {
    if (!isBumpKind(raw.defaultBump)) {
      throw fail('defaultBump', `unknown bump "${String(raw.defaultBump)}"`);
    }
    config.defaultBump = raw.defaultBump;
  }

  if (raw.snapshotTemplate !== undefined) {
    if (typeof raw.snapshotTemplate !== 'string') {
      throw fail('snapshotTemplate', 'expected a string');
    }
    config.snapshotTemplate = raw.snapshotTemplate;
  }
  validateSnapshotTemplate(config.snapshotTemplate);

  if (raw.propagation !== undefined) {
    if (!isOneOf(PROPAGATION_POLICIES, raw.propagation)) {
      throw fail('propagation', `expected one of ${PROPAGATION_POLICIES.join(', ')}`);
    }
    config.propagation = raw.propagation;
  }

  if (raw.propagateKinds !== undefined) {
    const kinds = raw.propagateKinds;
    if (!Array.isArray(kinds) || !kinds.every((kind: unknown) => isOneOf(EDGE_KINDS, kind))) {
      throw fail('propagateKinds', `expected a list of ${EDGE_KINDS.join(', ')}`);
    }
    config.propagateKinds = EDGE_KINDS.filter((kind: EdgeKind) => kinds.includes(kind));
  }

  const environments = optionalStrings(raw, 'environments', 'environments');
  if (environments !== undefined) config.environments = environments;

  if (raw.validationSeverity !== undefined) {
    if (!isRecord(raw.validationSeverity)) {
      throw fail('validationSeverity', 'expected an object');
    }
    for (const [category, severity] of Object.entries(raw.validationSeverity)) {
      if (!isOneOf(VALIDATION_CATEGORIES, category)) {
        throw fail(`validationSeverity.${category}`, 'unknown validation category');
      }
      if (!isOneOf<Severity>(['warning', 'error'], severity)) {
        throw fail(`validationSeverity.${category}`, 'expected warning or error');
      }
      config.validationSeverity[category] = severity;
    }
  }

  if (raw.changesetDir !== undefined) {
    if (typeof raw.changesetDir !== 'string' || raw.changesetDir.length === 0) {
      throw fail('changesetDir', 'expected a non-empty string');
    }
    config.changesetDir = raw.changesetDir;
  }

  if (raw.changesetFormat !== undefined) {
    if (raw.changesetFormat !== 'yaml' && raw.changesetFormat !== 'json') {
      throw fail('changesetFormat', 'expected yaml or json');
    }
    config.changesetFormat = raw.changesetFormat;
  }

  return Object.freeze(config);
}

/**
 * Find the configuration file of a workspace (supports both .jsonc and .json)
 */
export async function findConfigFile(root: string): Promise<string | null> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const path = join(root, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Load and validate the workspace configuration, falling back to defaults
 */
export async function loadEngineConfig(root: string, explicitPath?: string): Promise<Readonly<EngineConfig>> {
  const configPath = explicitPath ?? await findConfigFile(root);
  if (!configPath) {
    logger.debug('Config file not found, using defaults');
    return resolveEngineConfig({});
  }

  logger.debug(`Loading config from: ${configPath}`);
  let raw: unknown;
  try {
    raw = await readJsonOrJsoncFile(configPath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load configuration ${configPath}: ${reason}`, { path: configPath });
  }
  return resolveEngineConfig(raw);
}
