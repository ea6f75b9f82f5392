/**
 * Prompt Template for Command Help
 *
 * Builds the prompt asking the model for a four-field structured reply about
 * a command, grounded in its documentation when we have any.
 */

import { formatCommandLine } from '../commandArgs.js';

/** Documentation beyond this many characters is cut off. */
export const MAX_DOCUMENTATION_CHARS = 2000;

export const DOCUMENTATION_HEADER = 'MAN PAGE CONTENT:';
export const TRUNCATION_MARKER = '... (truncated)';

/**
 * Cuts documentation down to MAX_DOCUMENTATION_CHARS code points
 */
export function truncateDocumentation(documentation: string): string {
  const chars = Array.from(documentation);
  if (chars.length <= MAX_DOCUMENTATION_CHARS) {
    return documentation;
  }
  return `${chars.slice(0, MAX_DOCUMENTATION_CHARS).join('')}\n${TRUNCATION_MARKER}`;
}

/**
 * Builds the command help prompt
 * @param command - The target command
 * @param args - Its arguments
 * @param query - What the user asked
 * @param documentation - Man page or help text, if any was found
 * @returns The formatted prompt string
 */
export function buildCommandHelpPrompt(
  command: string,
  args: readonly string[],
  query: string,
  documentation?: string
): string {
  let prompt = `You are a command line expert. Help the user with this command context.

COMMAND CONTEXT: ${formatCommandLine(command, args)}
USER QUERY: ${query}`;

  if (documentation !== undefined) {
    prompt += `\n\n${DOCUMENTATION_HEADER}\n${truncateDocumentation(documentation)}`;
  }

  prompt += `

Please respond with structured output in this exact format:

EXPLANATION: [Brief explanation of what the user wants to achieve]
COMMAND: [Exact command to run, or NONE if no specific command recommended]
WARNINGS: [Any important warnings or caveats, or NONE]
INFO: [Additional helpful information, or NONE]
`;

  return prompt;
}
