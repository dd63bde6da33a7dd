import { Command } from 'commander';

import { createCliContext, globalOptions } from '../cli/context.js';
import { withErrorHandling } from '../utils/errors.js';
import { addPlanOptions, toEnginePlanOptions, type PlanCommandOptions } from './plan.js';
import { formatPlan } from './format.js';

export function setupVersionCommand(program: Command): void {
  addPlanOptions(
    program
      .command('version')
      .description('Apply the version plan to the manifests and mark the consumed changesets applied')
  ).action(withErrorHandling(async (options: PlanCommandOptions, command: Command) => {
    const ctx = await createCliContext(globalOptions(command));
    const result = await ctx.engine.version(toEnginePlanOptions(options));

    if (options.json) {
      console.log(JSON.stringify({
        plan: result.plan,
        issues: result.issues,
        written: result.written,
        applied: result.applied.map(changeset => changeset.id)
      }, null, 2));
      return;
    }

    ctx.output.message(formatPlan(result.plan));
    if (result.plan.steps.length > 0) {
      ctx.output.success(`Updated ${result.written.length} manifest(s), applied ${result.applied.length} changeset(s)`);
    }
  }));
}
