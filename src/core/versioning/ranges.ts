/**
 * Declared dependency ranges: evaluation and widening.
 */

import semver from 'semver';

const PATH_PROTOCOLS = ['file:', 'link:', 'portal:'] as const;
const WORKSPACE_PROTOCOL = 'workspace:';
const ANY_RANGES = new Set(['', '*', 'x', 'X', 'latest']);

export function isPathSpecifier(range: string): boolean {
  return PATH_PROTOCOLS.some(protocol => range.startsWith(protocol));
}

/**
 * Directory portion of a `file:`/`link:`/`portal:` specifier
 */
export function pathSpecifierTarget(range: string): string | null {
  for (const protocol of PATH_PROTOCOLS) {
    if (range.startsWith(protocol)) {
      return range.slice(protocol.length);
    }
  }
  return null;
}

interface SplitRange {
  prefix: string;
  body: string;
}

function splitWorkspaceProtocol(range: string): SplitRange {
  const trimmed = range.trim();
  if (trimmed.startsWith(WORKSPACE_PROTOCOL)) {
    return { prefix: WORKSPACE_PROTOCOL, body: trimmed.slice(WORKSPACE_PROTOCOL.length).trim() };
  }
  return { prefix: '', body: trimmed };
}

/**
 * Ranges that admit every version of their target and never need an edit
 */
export function isUnconstrainedRange(range: string): boolean {
  if (isPathSpecifier(range)) return true;
  const { prefix, body } = splitWorkspaceProtocol(range);
  if (prefix === WORKSPACE_PROTOCOL && (body === '^' || body === '~')) return true;
  return ANY_RANGES.has(body);
}

/**
 * Whether `range` is something semver can evaluate
 */
export function isEvaluableRange(range: string): boolean {
  if (isUnconstrainedRange(range)) return true;
  return semver.validRange(splitWorkspaceProtocol(range).body) !== null;
}

/**
 * Whether a declared range admits `version`. Ranges semver cannot evaluate
 * (URLs, git specifiers, tags) are treated as admitting.
 */
export function rangeAdmits(range: string, version: string): boolean {
  if (isUnconstrainedRange(range)) return true;
  const { body } = splitWorkspaceProtocol(range);
  if (semver.validRange(body) === null) return true;
  return semver.satisfies(version, body);
}

const X_RANGE_MAJOR = /^v?(\d+)(\.[xX*])?(\.[xX*])?$/;
const X_RANGE_MINOR = /^v?(\d+)\.(\d+)(\.[xX*])?$/;
const OPERATOR_RANGE = /^(\^|~|>=|>|=)?\s*v?(\d+(?:\.\d+){0,2}(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?)$/;

function widenBody(body: string, version: string): string | null {
  const parsed = semver.parse(version);
  if (!parsed) return null;

  if (X_RANGE_MAJOR.test(body)) {
    const match = X_RANGE_MAJOR.exec(body);
    const suffix = match ? `${match[2] ?? ''}${match[3] ?? ''}` : '';
    return `${parsed.major}${suffix}`;
  }
  if (X_RANGE_MINOR.test(body)) {
    const match = X_RANGE_MINOR.exec(body);
    return `${parsed.major}.${parsed.minor}${match?.[3] ?? ''}`;
  }

  const match = OPERATOR_RANGE.exec(body);
  if (!match) return null;
  const operator = match[1] ?? '';
  switch (operator) {
    case '^':
    case '~':
    case '>=':
    case '=':
    case '':
      return `${operator}${version}`;
    case '>':
      return `>=${version}`;
    default:
      return null;
  }
}

/**
 * Smallest range in the same operator style as `range` that admits `version`.
 * The `workspace:` prefix is kept. Returns the range unchanged when it already
 * admits the version, and null when it cannot be widened (compound or
 * upper-bounded ranges, or a style that cannot express the version).
 */
export function widenRange(range: string, version: string): string | null {
  if (rangeAdmits(range, version)) return range;

  const { prefix, body } = splitWorkspaceProtocol(range);
  const widened = widenBody(body, version);
  if (widened === null || !semver.satisfies(version, widened)) {
    return null;
  }
  return `${prefix}${widened}`;
}
