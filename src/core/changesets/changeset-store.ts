import { join } from 'path';

import type { FileProvider } from '../ports/file-provider.js';
import { codecFor, jsonChangesetCodec, yamlChangesetCodec, type ChangesetCodec } from '../ports/changeset-codec.js';
import { CHANGESET_STORE, PRODUCTION_ENVIRONMENT } from '../../constants/index.js';
import {
  ErrorCodes,
  MonoversionError,
  type Changeset,
  type ChangesetFilter,
  type ChangesetInput,
  type ChangesetStatus,
  type EngineConfig,
  type Logger,
  type Workspace
} from '../../types/index.js';
import { throwIfCancelled } from '../../utils/cancellation.js';
import { compareStrings } from '../../utils/compare.js';
import { ChangesetError } from '../../utils/errors.js';
import { isRecord } from '../../utils/guards.js';
import { logger as defaultLogger } from '../../utils/logger.js';
import { isBumpKind } from '../versioning/bump.js';
import { ChangesetIdGenerator, defaultIdGenerator } from './changeset-id.js';

export interface ChangesetStoreOptions {
  /** Workspace root the store directory is resolved against */
  root: string;
  files: FileProvider;
  config: Readonly<EngineConfig>;
  ids?: ChangesetIdGenerator;
  now?: () => Date;
  logger?: Logger;
  signal?: AbortSignal;
}

export interface CompactionResult {
  /** Ids of discarded records that were deleted */
  removed: string[];
  /** Ids of applied records moved into history */
  archived: string[];
}

const CODECS: readonly ChangesetCodec[] = [yamlChangesetCodec, jsonChangesetCodec];

interface LockRecord {
  pid: number;
  acquiredAt: string;
}

/**
 * File-backed store of changeset records, one file per changeset.
 */
export class ChangesetStore {
  readonly directory: string;
  private readonly historyDirectory: string;
  private readonly lockPath: string;
  private readonly files: FileProvider;
  private readonly config: Readonly<EngineConfig>;
  private readonly codec: ChangesetCodec;
  private readonly ids: ChangesetIdGenerator;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly signal?: AbortSignal;
  private holdsLock = false;

  constructor(options: ChangesetStoreOptions) {
    this.directory = join(options.root, options.config.changesetDir);
    this.historyDirectory = join(this.directory, CHANGESET_STORE.HISTORY_DIR);
    this.lockPath = join(this.directory, CHANGESET_STORE.LOCK_FILE);
    this.files = options.files;
    this.config = options.config;
    this.codec = codecFor(options.config.changesetFormat);
    this.ids = options.ids ?? defaultIdGenerator;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
    this.signal = options.signal;
  }

  /**
   * Validate and persist a new pending changeset
   */
  async create(input: ChangesetInput, workspace: Workspace): Promise<Changeset> {
    const invalid = (reason: string): ChangesetError =>
      new ChangesetError(`Invalid changeset: ${reason}`, ErrorCodes.INVALID_CHANGESET, { packageName: input.package });

    if (!workspace.packages.some(pkg => pkg.name === input.package)) {
      throw invalid(`package "${input.package}" is not a workspace member`);
    }
    if (!isBumpKind(input.bump)) {
      throw invalid(`unknown bump "${String(input.bump)}"`);
    }
    const description = input.description.trim();
    if (description.length === 0) {
      throw invalid('description must not be empty');
    }
    const author = input.author.trim();
    if (author.length === 0) {
      throw invalid('author must not be empty');
    }

    const environments = [...(input.environments ?? this.config.environments)];
    const changeset: Changeset = {
      id: this.ids.next(),
      package: input.package,
      bump: input.bump,
      description,
      author,
      createdAt: this.now().toISOString(),
      environments,
      status: 'pending',
      productionDeployment: input.productionDeployment ?? environments.includes(PRODUCTION_ENVIRONMENT)
    };

    await this.withLock(async () => {
      await this.write(changeset, this.codec);
    });
    this.logger.debug(`Created changeset ${changeset.id} for ${changeset.package}`);
    return changeset;
  }

  async get(id: string): Promise<Changeset> {
    const located = await this.locate(this.directory, id);
    return located.changeset;
  }

  /**
   * Records in the store directory, sorted by id
   */
  async list(filter: ChangesetFilter = {}): Promise<Changeset[]> {
    const changesets = await this.readDirectory(this.directory);
    return changesets.filter(changeset => matchesFilter(changeset, filter));
  }

  async pending(): Promise<Changeset[]> {
    return this.list({ status: 'pending' });
  }

  /**
   * Applied records moved out of the store by `compact`
   */
  async history(filter: ChangesetFilter = {}): Promise<Changeset[]> {
    const changesets = await this.readDirectory(this.historyDirectory);
    return changesets.filter(changeset => matchesFilter(changeset, filter));
  }

  async markApplied(id: string): Promise<Changeset> {
    return this.transition(id, 'applied');
  }

  async discard(id: string): Promise<Changeset> {
    return this.transition(id, 'discarded');
  }

  /**
   * Delete discarded records and move applied ones into history
   */
  async compact(): Promise<CompactionResult> {
    return this.withLock(async () => {
      const result: CompactionResult = { removed: [], archived: [] };
      for (const { changeset, path, codec } of await this.readEntries(this.directory)) {
        throwIfCancelled(this.signal);
        if (changeset.status === 'discarded') {
          await this.files.remove(path);
          result.removed.push(changeset.id);
        } else if (changeset.status === 'applied') {
          await this.files.ensureDir(this.historyDirectory);
          await this.files.rename(path, join(this.historyDirectory, `${changeset.id}${codec.extension}`));
          result.archived.push(changeset.id);
        }
      }
      this.logger.debug('Compacted changeset store', result);
      return result;
    });
  }

  private async transition(id: string, status: Exclude<ChangesetStatus, 'pending'>): Promise<Changeset> {
    return this.withLock(async () => {
      const { changeset, codec } = await this.locate(this.directory, id);
      if (changeset.status !== 'pending') {
        throw new ChangesetError(
          `Changeset ${id} is ${changeset.status}; only pending changesets can be marked ${status}`,
          ErrorCodes.INVALID_TRANSITION,
          { id, packageName: changeset.package }
        );
      }
      const updated: Changeset = { ...changeset, status };
      await this.write(updated, codec);
      return updated;
    });
  }

  private async write(changeset: Changeset, codec: ChangesetCodec): Promise<void> {
    throwIfCancelled(this.signal);
    const path = join(this.directory, `${changeset.id}${codec.extension}`);
    try {
      await this.files.ensureDir(this.directory);
      await this.files.writeTextAtomic(path, codec.encode(changeset));
    } catch (error) {
      throw new ChangesetError(
        `Failed to write changeset ${changeset.id}`,
        ErrorCodes.STORE_WRITE_FAILED,
        { id: changeset.id, path },
        error
      );
    }
  }

  private async locate(directory: string, id: string): Promise<{ changeset: Changeset; codec: ChangesetCodec }> {
    for (const codec of CODECS) {
      const path = join(directory, `${id}${codec.extension}`);
      if (await this.files.exists(path)) {
        const changeset = codec.decode(await this.files.readText(path), path);
        throwIfCancelled(this.signal);
        return { changeset, codec };
      }
    }
    throw new ChangesetError(`Changeset ${id} not found`, ErrorCodes.CHANGESET_NOT_FOUND, { id });
  }

  private async readDirectory(directory: string): Promise<Changeset[]> {
    const entries = await this.readEntries(directory);
    return entries.map(entry => entry.changeset);
  }

  private async readEntries(directory: string): Promise<Array<{ changeset: Changeset; path: string; codec: ChangesetCodec }>> {
    const names = await this.files.listFiles(directory);
    throwIfCancelled(this.signal);
    const entries: Array<{ changeset: Changeset; path: string; codec: ChangesetCodec }> = [];
    for (const name of names) {
      if (name.startsWith('.')) continue;
      const codec = CODECS.find(candidate => name.endsWith(candidate.extension));
      if (!codec) continue;

      const path = join(directory, name);
      const changeset = codec.decode(await this.files.readText(path), path);
      throwIfCancelled(this.signal);
      if (`${changeset.id}${codec.extension}` !== name) {
        throw new ChangesetError(
          `Invalid changeset record ${path}: id ${changeset.id} does not match the file name`,
          ErrorCodes.INVALID_CHANGESET,
          { path, id: changeset.id }
        );
      }
      entries.push({ changeset, path, codec });
    }
    return entries.sort((a, b) => compareStrings(a.changeset.id, b.changeset.id));
  }

  /**
   * Run `operation` while holding the advisory store lock. Store calls made
   * from inside `operation` reuse the held lock.
   */
  async withLock<T>(operation: () => Promise<T>): Promise<T> {
    if (this.holdsLock) return operation();
    await this.acquireLock();
    this.holdsLock = true;
    try {
      return await operation();
    } finally {
      this.holdsLock = false;
      await this.files.remove(this.lockPath);
    }
  }

  private async acquireLock(): Promise<void> {
    await this.files.ensureDir(this.directory);
    const record: LockRecord = { pid: process.pid, acquiredAt: this.now().toISOString() };
    const content = `${JSON.stringify(record)}\n`;
    if (await this.files.createExclusive(this.lockPath, content)) {
      return;
    }

    const holder = await this.readLock();
    const age = holder ? this.now().getTime() - Date.parse(holder.acquiredAt) : Infinity;
    if (age <= CHANGESET_STORE.STALE_LOCK_MS) {
      throw new ChangesetError(
        `Changeset store is locked by process ${holder ? holder.pid : 'unknown'}`,
        ErrorCodes.STORE_LOCKED,
        { lockPath: this.lockPath }
      );
    }

    this.logger.warn(`Taking over stale changeset store lock ${this.lockPath}`);
    await this.files.remove(this.lockPath);
    if (!(await this.files.createExclusive(this.lockPath, content))) {
      throw new ChangesetError('Changeset store is locked by another process', ErrorCodes.STORE_LOCKED, { lockPath: this.lockPath });
    }
  }

  private async readLock(): Promise<LockRecord | null> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await this.files.readText(this.lockPath));
    } catch (error) {
      if (error instanceof MonoversionError && error.kind === 'cancelled') throw error;
      this.logger.debug(`Unreadable lock file ${this.lockPath}`, error);
      return null;
    }
    if (
      isRecord(parsed) &&
      typeof parsed.pid === 'number' &&
      typeof parsed.acquiredAt === 'string' &&
      !Number.isNaN(Date.parse(parsed.acquiredAt))
    ) {
      return { pid: parsed.pid, acquiredAt: parsed.acquiredAt };
    }
    return null;
  }
}

function matchesFilter(changeset: Changeset, filter: ChangesetFilter): boolean {
  if (filter.status !== undefined && changeset.status !== filter.status) return false;
  if (filter.package !== undefined && changeset.package !== filter.package) return false;
  if (filter.author !== undefined && changeset.author !== filter.author) return false;
  if (filter.environment !== undefined && !changeset.environments.includes(filter.environment)) return false;
  return true;
}
