#!/usr/bin/env node

import { readFileSync } from 'fs';

import { Command } from 'commander';

import { logger } from './utils/logger.js';
import { isRecord } from './utils/guards.js';
import { EXIT_CODES } from './utils/errors.js';
import { setupAffectedCommand } from './commands/affected.js';
import { setupGraphCommand } from './commands/graph.js';
import { setupPlanCommand } from './commands/plan.js';
import { setupVersionCommand } from './commands/version.js';
import { setupValidateCommand } from './commands/validate.js';
import { setupChangesetCommand } from './commands/changeset.js';

/**
 * monoversion CLI - Main entry point
 *
 * Change-impact analysis and version propagation for npm-style workspaces.
 */

function getVersion(): string {
  try {
    const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (isRecord(manifest) && typeof manifest.version === 'string') {
      return manifest.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', error);
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('monoversion')
  .description('Change-impact analysis and version propagation for monorepo workspaces')
  .version(getVersion())
  .option('--cwd <dir>', 'workspace root (default: current directory)')
  .option('--config <path>', 'configuration file (default: monoversion.config.jsonc or .json)')
  .option('--verbose', 'print debug logs')
  .option('--no-interactive', 'never prompt, even in a terminal')
  .configureHelp({ sortSubcommands: true });

// === ANALYSIS ===
setupAffectedCommand(program);
setupGraphCommand(program);
setupValidateCommand(program);

// === VERSIONING ===
setupPlanCommand(program);
setupVersionCommand(program);
setupChangesetCommand(program);

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('✗ An unexpected error occurred. Run with --verbose for details.');
  process.exit(EXIT_CODES.PROVIDER);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('✗ An unexpected error occurred. Run with --verbose for details.');
  process.exit(EXIT_CODES.PROVIDER);
});

export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

run().catch((error: unknown) => {
  logger.error('Fatal error in main execution', { error });
  console.error('✗ Fatal error occurred. Exiting.');
  process.exitCode = EXIT_CODES.PROVIDER;
});
