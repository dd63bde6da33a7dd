/**
 * Changeset Codec Port
 *
 * Text encoding of persisted changeset records. Field names and order are
 * fixed so that diffs of the store directory stay stable.
 */

import * as yaml from 'js-yaml';

import type { Changeset, ChangesetFormat, ChangesetStatus } from '../../types/index.js';
import { ErrorCodes } from '../../types/index.js';
import { ChangesetError } from '../../utils/errors.js';
import { isRecord, isStringArray } from '../../utils/guards.js';
import { isBumpKind } from '../versioning/bump.js';

export interface ChangesetCodec {
  readonly format: ChangesetFormat;
  /** File extension including the dot */
  readonly extension: string;
  encode(changeset: Changeset): string;
  decode(text: string, source: string): Changeset;
}

/**
 * Persisted field order
 */
export const CHANGESET_RECORD_FIELDS = [
  'id',
  'package',
  'bump',
  'description',
  'author',
  'created_at',
  'environments',
  'status',
  'production_deployment'
] as const;

type ChangesetRecordField = typeof CHANGESET_RECORD_FIELDS[number];

const STATUSES: readonly ChangesetStatus[] = ['pending', 'applied', 'discarded'];

function isStatus(value: unknown): value is ChangesetStatus {
  return typeof value === 'string' && STATUSES.some(status => status === value);
}

export function toRecord(changeset: Changeset): Record<ChangesetRecordField, string | string[] | boolean> {
  return {
    id: changeset.id,
    package: changeset.package,
    bump: changeset.bump,
    description: changeset.description,
    author: changeset.author,
    created_at: changeset.createdAt,
    environments: [...changeset.environments],
    status: changeset.status,
    production_deployment: changeset.productionDeployment
  };
}

export function fromRecord(value: unknown, source: string): Changeset {
  const invalid = (reason: string): ChangesetError =>
    new ChangesetError(`Invalid changeset record ${source}: ${reason}`, ErrorCodes.INVALID_CHANGESET, { source });

  if (!isRecord(value)) {
    throw invalid('expected a mapping');
  }
  const record = value;
  const str = (field: ChangesetRecordField): string => {
    const raw = record[field];
    if (typeof raw !== 'string') {
      throw invalid(`"${field}" must be a string`);
    }
    return raw;
  };

  const bump: unknown = record.bump;
  if (!isBumpKind(bump)) {
    throw invalid(`unknown bump "${String(bump)}"`);
  }
  const status: unknown = record.status;
  if (!isStatus(status)) {
    throw invalid(`unknown status "${String(status)}"`);
  }
  const environments: unknown = record.environments ?? [];
  if (!isStringArray(environments)) {
    throw invalid('"environments" must be a list of strings');
  }
  // js-yaml turns unquoted timestamps into Date objects
  const createdAtRaw: unknown = record.created_at;
  const createdAt = createdAtRaw instanceof Date ? createdAtRaw.toISOString() : str('created_at');

  return {
    id: str('id'),
    package: str('package'),
    bump,
    description: str('description'),
    author: str('author'),
    createdAt,
    environments,
    status,
    productionDeployment: record.production_deployment === true
  };
}

export const yamlChangesetCodec: ChangesetCodec = {
  format: 'yaml',
  extension: '.yaml',

  encode(changeset: Changeset): string {
    return yaml.dump(toRecord(changeset), { lineWidth: -1, noRefs: true, sortKeys: false });
  },

  decode(text: string, source: string): Changeset {
    let parsed: unknown;
    try {
      parsed = yaml.load(text);
    } catch (error) {
      throw new ChangesetError(`Invalid changeset record ${source}: malformed YAML`, ErrorCodes.INVALID_CHANGESET, { source }, error);
    }
    return fromRecord(parsed, source);
  }
};

export const jsonChangesetCodec: ChangesetCodec = {
  format: 'json',
  extension: '.json',

  encode(changeset: Changeset): string {
    return `${JSON.stringify(toRecord(changeset), null, 2)}\n`;
  },

  decode(text: string, source: string): Changeset {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ChangesetError(`Invalid changeset record ${source}: malformed JSON`, ErrorCodes.INVALID_CHANGESET, { source }, error);
    }
    return fromRecord(parsed, source);
  }
};

export function codecFor(format: ChangesetFormat): ChangesetCodec {
  return format === 'json' ? jsonChangesetCodec : yamlChangesetCodec;
}
