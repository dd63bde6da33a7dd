import { Command } from 'commander';

import { createCliContext, globalOptions } from '../cli/context.js';
import type { ChangeAttribution } from '../types/index.js';
import { ConfigError, withErrorHandling } from '../utils/errors.js';
import { formatAttribution } from './format.js';

interface AffectedOptions {
  since?: string;
  until?: string;
  includeRoot?: boolean;
  strict?: boolean;
  json?: boolean;
}

export function setupAffectedCommand(program: Command): void {
  program
    .command('affected')
    .argument('[files...]', 'changed files relative to the workspace root (instead of --since)')
    .description('List packages affected by a set of changes')
    .option('--since <revision>', 'base revision to compare against')
    .option('--until <revision>', 'head revision (default: working tree)')
    .option('--include-root', 'treat root-level changes as affecting every package')
    .option('--strict', 'fail when a changed file belongs to no package')
    .option('--json', 'print the attribution as JSON')
    .action(withErrorHandling(async (files: string[], options: AffectedOptions, command: Command) => {
      const ctx = await createCliContext(globalOptions(command));
      const attributionOptions = { includeRootChanges: options.includeRoot, strict: options.strict };

      let attribution: ChangeAttribution;
      if (files.length > 0) {
        attribution = await ctx.engine.attributeFiles(files, attributionOptions);
      } else if (options.since !== undefined) {
        attribution = await ctx.engine.affected({ ...attributionOptions, since: options.since, until: options.until });
      } else {
        throw new ConfigError('Pass changed files or --since <revision>');
      }

      if (options.json) {
        console.log(JSON.stringify(attribution, null, 2));
        return;
      }
      ctx.output.message(formatAttribution(attribution));
    }));
}
