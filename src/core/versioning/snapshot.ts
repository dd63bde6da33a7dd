import semver from 'semver';

import { ConfigError } from '../../utils/errors.js';

export const SNAPSHOT_PLACEHOLDERS = ['version', 'sha', 'timestamp'] as const;

type Placeholder = typeof SNAPSHOT_PLACEHOLDERS[number];

export interface SnapshotContext {
  /** Revision identifier substituted for `{sha}` */
  sha?: string;
  /** Clock used for `{timestamp}` */
  now: Date;
}

const PLACEHOLDER = /\{([^{}]*)\}/g;

function isPlaceholder(name: string): name is Placeholder {
  return SNAPSHOT_PLACEHOLDERS.some(known => known === name);
}

/**
 * Reject templates with unknown placeholders or without `{version}`.
 * Placeholders: `{version}` is the current release numbers with patch + 1
 * (not the current version itself, which a prerelease would sort below),
 * `{sha}` the revision identifier and `{timestamp}` Unix seconds.
 */
export function validateSnapshotTemplate(template: string): void {
  const names = Array.from(template.matchAll(PLACEHOLDER), match => match[1] ?? '');
  const unknown = names.filter(name => !isPlaceholder(name));
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown snapshot template placeholder(s): ${unknown.map(name => `{${name}}`).join(', ')}`,
      { template }
    );
  }
  if (!names.includes('version')) {
    throw new ConfigError('Snapshot template must contain {version}', { template });
  }
}

/**
 * Prerelease identifiers only admit [0-9A-Za-z-]
 */
function sanitizeIdentifier(value: string): string {
  return value.replace(/[^0-9A-Za-z-]+/g, '-');
}

/**
 * Render a snapshot version. `{version}` expands to the current release
 * numbers with patch + 1, so the result sorts above the current version.
 */
export function renderSnapshotVersion(template: string, currentVersion: string, context: SnapshotContext): string {
  validateSnapshotTemplate(template);
  const parsed = semver.parse(currentVersion);
  if (!parsed) {
    throw new ConfigError(`Cannot render snapshot for invalid version ${currentVersion}`);
  }

  const values: Record<Placeholder, () => string> = {
    version: () => `${parsed.major}.${parsed.minor}.${parsed.patch + 1}`,
    sha: () => {
      if (!context.sha) {
        throw new ConfigError('Snapshot template uses {sha} but no revision identifier was supplied', { template });
      }
      return sanitizeIdentifier(context.sha);
    },
    timestamp: () => String(Math.floor(context.now.getTime() / 1000))
  };

  const rendered = template.replace(PLACEHOLDER, (_match, name: string) => (isPlaceholder(name) ? values[name]() : ''));
  const valid = semver.valid(rendered);
  if (!valid) {
    throw new ConfigError(`Snapshot template produced an invalid version "${rendered}"`, { template });
  }
  return valid;
}
