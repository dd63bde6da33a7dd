import { Command, Option } from 'commander';

import { createCliContext, globalOptions } from '../cli/context.js';
import type { EnginePlanOptions } from '../core/engine.js';
import { PROPAGATION_POLICIES } from '../core/config.js';
import { hasErrors } from '../core/validation/validator.js';
import { EXIT_CODES, withErrorHandling } from '../utils/errors.js';
import { isOneOf } from '../utils/guards.js';
import { formatIssues, formatPlan } from './format.js';

export interface PlanCommandOptions {
  policy?: string;
  collectAll?: boolean;
  since?: string;
  includeRoot?: boolean;
  sha?: string;
  json?: boolean;
}

/**
 * Options shared by `plan` and `version`
 */
export function addPlanOptions(command: Command): Command {
  return command
    .addOption(new Option('--policy <policy>', 'propagation policy').choices(PROPAGATION_POLICIES))
    .option('--collect-all', 'report every conflict instead of stopping at the first')
    .option('--since <revision>', 'also bump packages affected by changes since this revision')
    .option('--include-root', 'with --since, treat root-level changes as affecting every package')
    .option('--sha <sha>', 'revision identifier for snapshot versions')
    .option('--json', 'print the result as JSON');
}

export function toEnginePlanOptions(options: PlanCommandOptions): EnginePlanOptions {
  const policy = options.policy;
  return {
    strategy: isOneOf(PROPAGATION_POLICIES, policy) ? { propagation: policy } : undefined,
    conflictMode: options.collectAll ? 'collectAll' : 'failFast',
    since: options.since,
    attribution: { includeRootChanges: options.includeRoot },
    sha: options.sha
  };
}

export function setupPlanCommand(program: Command): void {
  addPlanOptions(
    program
      .command('plan')
      .description('Compute the next versions from pending changesets without writing anything')
  ).action(withErrorHandling(async (options: PlanCommandOptions, command: Command) => {
    const ctx = await createCliContext(globalOptions(command));
    const { plan, issues } = await ctx.engine.plan(toEnginePlanOptions(options));

    if (options.json) {
      console.log(JSON.stringify({ plan, issues }, null, 2));
    } else {
      ctx.output.message(formatPlan(plan));
      if (issues.length > 0) {
        ctx.output.note(formatIssues(issues), 'Validation');
      }
    }

    if (hasErrors(issues)) {
      process.exitCode = EXIT_CODES.VALIDATION;
    }
  }));
}
