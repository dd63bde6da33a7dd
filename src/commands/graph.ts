import { Command } from 'commander';

import { createCliContext, globalOptions } from '../cli/context.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatGraph } from './format.js';

interface GraphOptions {
  json?: boolean;
}

export function setupGraphCommand(program: Command): void {
  program
    .command('graph')
    .description('Show the internal dependency graph and its topological order')
    .option('--json', 'print the graph as JSON')
    .action(withErrorHandling(async (options: GraphOptions, command: Command) => {
      const ctx = await createCliContext(globalOptions(command));
      const { graph } = await ctx.engine.snapshot();

      if (options.json) {
        console.log(JSON.stringify(graph, null, 2));
        return;
      }
      ctx.output.message(formatGraph(graph));
      if (graph.cycles.length > 0) {
        ctx.output.warn(`${graph.cycles.length} dependency cycle(s) found`);
      }
    }));
}
