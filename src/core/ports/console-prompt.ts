/**
 * Prompt port for headless runs (CI, pipes, `--no-interactive`). Every
 * prompt fails, so commands must receive their input through flags.
 */

import type { PromptPort, PromptChoice, TextPromptOptions } from './prompt.js';
import { ConfigError } from '../../utils/errors.js';

export class NonInteractivePromptError extends ConfigError {
  constructor(question: string) {
    super(`Cannot ask "${question}" without a terminal; pass the value as a command-line flag`, { question });
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  async select<T extends string>(message: string, _choices: Array<PromptChoice<T>>): Promise<T> {
    throw new NonInteractivePromptError(message);
  },

  async text(message: string, _options?: TextPromptOptions): Promise<string> {
    throw new NonInteractivePromptError(message);
  }
};
