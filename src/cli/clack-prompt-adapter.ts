/**
 * Clack Prompt Adapter
 *
 * CLI-specific PromptPort implementation that routes to @clack/prompts
 * for rich interactive terminal prompts.
 */

import * as clack from '@clack/prompts';
import type { PromptPort, PromptChoice, TextPromptOptions } from '../core/ports/prompt.js';
import { CancelledError } from '../utils/errors.js';

function cancelled(): CancelledError {
  clack.cancel('Operation cancelled.');
  return new CancelledError('Operation cancelled by user');
}

/**
 * Create a Clack-based PromptPort for interactive terminal sessions.
 */
export function createClackPrompt(): PromptPort {
  return {
    async select<T extends string>(message: string, choices: Array<PromptChoice<T>>): Promise<T> {
      const options: Array<{ value: string; label: string; hint?: string }> = choices.map(choice => ({
        value: choice.value,
        label: choice.title,
        ...(choice.description ? { hint: choice.description } : {})
      }));
      const result = await clack.select({ message, options });
      if (clack.isCancel(result)) {
        throw cancelled();
      }
      const picked = choices.find(choice => choice.value === result);
      if (!picked) {
        throw cancelled();
      }
      return picked.value;
    },

    async text(message: string, options?: TextPromptOptions): Promise<string> {
      const result = await clack.text({
        message,
        placeholder: options?.placeholder,
        defaultValue: options?.initial,
        validate: options?.validate
      });
      if (clack.isCancel(result)) {
        throw cancelled();
      }
      return result;
    }
  };
}
