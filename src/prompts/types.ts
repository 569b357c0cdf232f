/**
 * Prompt management types.
 * Prompts are versioned so cached output can be traced to the wording that produced it.
 */

export interface PromptDefinition<TInput = unknown> {
  /** Unique identifier for this prompt */
  id: string;

  /** Bumped whenever the wording changes */
  version: number;

  /** Human-readable description of what this prompt does */
  description: string;

  /** Function that builds the prompt string from input */
  build: (input: TInput) => string;
}
