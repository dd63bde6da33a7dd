import { Command } from 'commander';

import { createCliContext, globalOptions } from '../cli/context.js';
import { EXIT_CODES, withErrorHandling } from '../utils/errors.js';
import { hasErrors } from '../core/validation/validator.js';
import { formatIssues } from './format.js';

interface ValidateOptions {
  json?: boolean;
}

export function setupValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check pattern coverage, cycles, ranges and external duplication')
    .option('--json', 'print the issues as JSON')
    .action(withErrorHandling(async (options: ValidateOptions, command: Command) => {
      const ctx = await createCliContext(globalOptions(command));
      const issues = await ctx.engine.validate();

      if (options.json) {
        console.log(JSON.stringify(issues, null, 2));
      } else if (hasErrors(issues)) {
        ctx.output.error(formatIssues(issues));
      } else {
        ctx.output.success(formatIssues(issues));
      }

      if (hasErrors(issues)) {
        process.exitCode = EXIT_CODES.VALIDATION;
      }
    }));
}
