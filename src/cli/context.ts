/**
 * CLI Context Factory
 *
 * Creates the engine and the CLI-specific ports (Clack output and prompts in
 * a TTY, plain console otherwise) from the global command-line options.
 * Command handlers should use this instead of constructing the engine
 * directly so every command resolves the root, config and ports the same way.
 */

import { resolve } from 'path';

import type { Command } from 'commander';

import { MonoversionEngine } from '../core/engine.js';
import { loadEngineConfig } from '../core/config.js';
import { NodeFileProvider } from '../core/ports/node-file-provider.js';
import { JsonManifestProvider } from '../core/ports/json-manifest-provider.js';
import { GitVcsProvider } from '../core/ports/git-vcs-provider.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { nonInteractivePrompt } from '../core/ports/console-prompt.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import { LogLevel } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { createClackOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';

export interface GlobalOptions {
  cwd?: string;
  config?: string;
  verbose?: boolean;
  /** `--no-interactive` sets this to false */
  interactive?: boolean;
}

export interface CliContext {
  engine: MonoversionEngine;
  output: OutputPort;
  prompt: PromptPort;
  interactive: boolean;
  signal: AbortSignal;
}

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedClackPrompt: PromptPort | undefined;

function getCliPorts(isInteractive: boolean): { output: OutputPort; prompt: PromptPort } {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    cachedClackPrompt ??= createClackPrompt();
    return { output: cachedClackOutput, prompt: cachedClackPrompt };
  }
  return { output: consoleOutput, prompt: nonInteractivePrompt };
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override === false) return false;
  const isTTY = process.stdin.isTTY === true && process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

let cancellation: AbortController | undefined;

/**
 * One controller per process; the first SIGINT aborts the running operation.
 */
function cancellationSignal(): AbortSignal {
  if (!cancellation) {
    const controller = new AbortController();
    process.once('SIGINT', () => {
      logger.debug('SIGINT received, cancelling');
      controller.abort();
    });
    cancellation = controller;
  }
  return cancellation.signal;
}

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Create the engine and ports for a command invocation.
 */
export async function createCliContext(options: GlobalOptions): Promise<CliContext> {
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const root = resolve(process.cwd(), options.cwd ?? '.');
  const configPath = options.config === undefined ? undefined : resolve(process.cwd(), options.config);
  const config = await loadEngineConfig(root, configPath);
  const signal = cancellationSignal();
  const interactive = detectInteractive(options.interactive);

  const engine = new MonoversionEngine({
    root,
    config,
    files: new NodeFileProvider(),
    manifests: new JsonManifestProvider(),
    vcs: new GitVcsProvider(root),
    logger,
    signal
  });

  logger.debug(`Working directory: ${root}`);
  return { engine, interactive, signal, ...getCliPorts(interactive) };
}
