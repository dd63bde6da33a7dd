import { userInfo } from 'os';

import { Command, Option } from 'commander';

import { createCliContext, globalOptions, type CliContext } from '../cli/context.js';
import { BUMP_KINDS, isBumpKind } from '../core/versioning/bump.js';
import type { BumpKind, ChangesetFilter, ChangesetStatus } from '../types/index.js';
import { ConfigError, withErrorHandling } from '../utils/errors.js';
import { isOneOf } from '../utils/guards.js';
import { logger } from '../utils/logger.js';
import { formatChangeset, formatChangesets } from './format.js';

interface AddOptions {
  package?: string;
  bump?: string;
  message?: string;
  author?: string;
  env?: string[];
  production?: boolean;
  json?: boolean;
}

interface ListOptions {
  status?: string;
  package?: string;
  author?: string;
  env?: string;
  history?: boolean;
  json?: boolean;
}

interface JsonOption {
  json?: boolean;
}

const STATUSES: readonly ChangesetStatus[] = ['pending', 'applied', 'discarded'];

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function defaultAuthor(): string {
  const fromEnv = process.env.GIT_AUTHOR_NAME ?? process.env.USER;
  if (fromEnv) return fromEnv;
  try {
    return userInfo().username;
  } catch (error) {
    logger.debug('Could not read the current user name', error);
    return '';
  }
}

async function resolvePackage(ctx: CliContext, names: string[], given?: string): Promise<string> {
  if (given !== undefined) return given;
  if (!ctx.interactive) {
    throw new ConfigError('Missing --package in non-interactive mode');
  }
  return ctx.prompt.select('Which package changed?', names.map(name => ({ title: name, value: name })));
}

async function resolveBump(ctx: CliContext, given?: string): Promise<BumpKind> {
  if (given !== undefined) {
    if (!isBumpKind(given)) {
      throw new ConfigError(`Unknown bump "${given}"; expected one of ${BUMP_KINDS.join(', ')}`);
    }
    return given;
  }
  if (!ctx.interactive) {
    throw new ConfigError('Missing --bump in non-interactive mode');
  }
  return ctx.prompt.select<BumpKind>('What kind of change is it?', [
    { title: 'patch', value: 'patch', description: 'fixes, no API change' },
    { title: 'minor', value: 'minor', description: 'new backwards-compatible features' },
    { title: 'major', value: 'major', description: 'breaking changes' },
    { title: 'snapshot', value: 'snapshot', description: 'pre-release build' },
    { title: 'none', value: 'none', description: 'record without a version change' }
  ]);
}

async function resolveDescription(ctx: CliContext, given?: string): Promise<string> {
  if (given !== undefined) return given;
  if (!ctx.interactive) {
    throw new ConfigError('Missing --message in non-interactive mode');
  }
  return ctx.prompt.text('Describe the change', {
    placeholder: 'Summary for the changelog',
    validate: value => (value.trim().length === 0 ? 'A description is required' : undefined)
  });
}

function toFilter(options: ListOptions): ChangesetFilter {
  const status = options.status;
  return {
    status: isOneOf(STATUSES, status) ? status : undefined,
    package: options.package,
    author: options.author,
    environment: options.env
  };
}

export function setupChangesetCommand(program: Command): void {
  const changeset = program
    .command('changeset')
    .description('Manage changeset records');

  changeset
    .command('add')
    .description('Record a pending change for a package')
    .option('-p, --package <name>', 'package the change belongs to')
    .addOption(new Option('-b, --bump <kind>', 'bump kind').choices(BUMP_KINDS))
    .option('-m, --message <text>', 'description of the change')
    .option('--author <name>', 'author of the change (default: current user)')
    .option('--env <environment>', 'target environment (repeatable)', collect)
    .option('--production', 'mark the change as a production deployment')
    .option('--json', 'print the created record as JSON')
    .action(withErrorHandling(async (options: AddOptions, command: Command) => {
      const ctx = await createCliContext(globalOptions(command));
      const { workspace } = await ctx.engine.snapshot();
      const names = workspace.packages.map(pkg => pkg.name);

      const pkg = await resolvePackage(ctx, names, options.package);
      const bump = await resolveBump(ctx, options.bump);
      const description = await resolveDescription(ctx, options.message);

      const created = await ctx.engine.store.create({
        package: pkg,
        bump,
        description,
        author: options.author ?? defaultAuthor(),
        environments: options.env,
        productionDeployment: options.production
      }, workspace);

      if (options.json) {
        console.log(JSON.stringify(created, null, 2));
        return;
      }
      ctx.output.success(`Created changeset ${created.id}`);
    }));

  changeset
    .command('list')
    .description('List changeset records')
    .addOption(new Option('--status <status>', 'only records with this status').choices(STATUSES))
    .option('--package <name>', 'only records for this package')
    .option('--author <name>', 'only records by this author')
    .option('--env <environment>', 'only records targeting this environment')
    .option('--history', 'list archived records instead')
    .option('--json', 'print the records as JSON')
    .action(withErrorHandling(async (options: ListOptions, command: Command) => {
      const ctx = await createCliContext(globalOptions(command));
      const filter = toFilter(options);
      const records = options.history
        ? await ctx.engine.store.history(filter)
        : await ctx.engine.store.list(filter);

      if (options.json) {
        console.log(JSON.stringify(records, null, 2));
        return;
      }
      ctx.output.message(formatChangesets(records));
    }));

  changeset
    .command('applied')
    .argument('<id>', 'changeset id')
    .description('Mark a pending changeset applied')
    .option('--json', 'print the updated record as JSON')
    .action(withErrorHandling(async (id: string, options: JsonOption, command: Command) => {
      const ctx = await createCliContext(globalOptions(command));
      const updated = await ctx.engine.store.markApplied(id);
      if (options.json) {
        console.log(JSON.stringify(updated, null, 2));
        return;
      }
      ctx.output.success(formatChangeset(updated));
    }));

  changeset
    .command('discard')
    .argument('<id>', 'changeset id')
    .description('Discard a pending changeset')
    .option('--json', 'print the updated record as JSON')
    .action(withErrorHandling(async (id: string, options: JsonOption, command: Command) => {
      const ctx = await createCliContext(globalOptions(command));
      const updated = await ctx.engine.store.discard(id);
      if (options.json) {
        console.log(JSON.stringify(updated, null, 2));
        return;
      }
      ctx.output.success(formatChangeset(updated));
    }));

  changeset
    .command('compact')
    .description('Delete discarded records and archive applied ones')
    .option('--json', 'print the result as JSON')
    .action(withErrorHandling(async (options: JsonOption, command: Command) => {
      const ctx = await createCliContext(globalOptions(command));
      const result = await ctx.engine.store.compact();
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      ctx.output.success(`Removed ${result.removed.length} discarded and archived ${result.archived.length} applied changeset(s)`);
    }));
}
