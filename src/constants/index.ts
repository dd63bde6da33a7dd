/**
 * Shared constants for monoversion
 * Single source of truth for file names, directory names and defaults.
 */

export const FILE_PATTERNS = {
  PACKAGE_JSON: 'package.json',
  CONFIG_JSONC: 'monoversion.config.jsonc',
  CONFIG_JSON: 'monoversion.config.json'
} as const;

export const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON] as const;

export const CHANGESET_STORE = {
  DIR: '.changesets',
  HISTORY_DIR: 'history',
  LOCK_FILE: '.lock',
  /** A lock file older than this is considered abandoned */
  STALE_LOCK_MS: 30_000
} as const;

export const DEFAULT_SNAPSHOT_TEMPLATE = '{version}-snapshot.{sha}';

export const DEFAULT_ENVIRONMENTS = ['staging', 'production'] as const;

export const PRODUCTION_ENVIRONMENT = 'production';
