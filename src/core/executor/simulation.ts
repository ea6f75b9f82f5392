/**
 * Offline Simulation Backend
 *
 * Answers from a few hardcoded scenarios chosen by keywords in the prompt.
 * Needs no credentials and never fails, so the rest of the pipeline can be
 * exercised without a network.
 */

import { DOCUMENTATION_HEADER } from '../promptTemplates/commandHelp.js';
import type { LLMResponse } from '../responseParser.js';
import type { LLMBackend } from './types.js';

function containsAll(text: string, words: readonly string[]): boolean {
  return words.every(word => text.includes(word));
}

/**
 * Picks the canned answer for a prompt
 */
export function simulateLLMResponse(prompt: string): LLMResponse {
  const hasManPage = prompt.includes(DOCUMENTATION_HEADER);

  if (containsAll(prompt, ['git', 'reset', 'unstage'])) {
    const info = "After running this command, your changes will still be present in your working directory but will no longer be staged for commit. You can re-stage them later with 'git add'.";
    return {
      explanation: 'You want to unstage changes that are currently in the git index (staging area) but keep them as modified files in your working directory.',
      recommendedCommand: 'git reset HEAD',
      warnings: "This will unstage ALL staged changes. To unstage specific files, use 'git reset HEAD <filename>'.",
      additionalInfo: hasManPage ? `${info} (Analysis based on git man page)` : info
    };
  }

  if (containsAll(prompt, ['docker', 'ps', 'running'])) {
    const info = "By default, 'docker ps' only shows running containers. To see all containers including stopped ones, use 'docker ps -a'.";
    return {
      explanation: 'You want to see only currently running Docker containers, not stopped ones.',
      recommendedCommand: 'docker ps',
      additionalInfo: hasManPage ? `${info} (Analysis based on docker man page)` : info
    };
  }

  return {
    explanation: 'This is a simulated LLM response for testing purposes.',
    warnings: hasManPage
      ? 'This is a simulated response with man page context. For real AI assistance, configure an API key.'
      : 'This is a simulated response without man page context. For real AI assistance, configure an API key.',
    additionalInfo: 'Set LOCALHELP_LLM_PROVIDER and LOCALHELP_API_KEY environment variables.'
  };
}

export const simulationBackend: LLMBackend = {
  async respond(_config, prompt): Promise<LLMResponse> {
    return simulateLLMResponse(prompt);
  }
};
