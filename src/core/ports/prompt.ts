/**
 * Prompt Port Interface
 *
 * Defines the contract for interactive user prompts.
 *
 * Implementations:
 *   - ClackPromptAdapter (CLI): routes to @clack/prompts
 *   - NonInteractivePromptAdapter (CI/default): throws on prompt attempts
 */

/**
 * A single choice option for select prompts.
 */
export interface PromptChoice<T extends string = string> {
  title: string;
  value: T;
  description?: string;
}

/**
 * Options for text input prompts.
 */
export interface TextPromptOptions {
  initial?: string;
  placeholder?: string;
  validate?: (value: string) => string | undefined;
}

/**
 * PromptPort defines all interactive prompt operations.
 */
export interface PromptPort {
  /** Prompt user to select one item from a list */
  select<T extends string>(
    message: string,
    choices: Array<PromptChoice<T>>
  ): Promise<T>;

  /** Prompt user for text input */
  text(
    message: string,
    options?: TextPromptOptions
  ): Promise<string>;
}
