/**
 * Pending Provider Integrations
 *
 * OpenAI, Anthropic and local (e.g. Ollama) endpoints are selectable but not
 * wired to a network client yet. They validate their configuration and
 * answer with a canned response explaining the situation.
 */

import type { Config } from '../../utils/env.js';
import type { LLMResponse } from '../responseParser.js';
import type { LLMBackend } from './types.js';

const USE_SIMULATION = 'Coming soon! For now, use simulation mode.';

/**
 * Builds a backend that needs one configuration value and otherwise returns a
 * "not yet implemented" answer
 */
function pendingBackend(
  name: string,
  hasRequirement: (config: Config) => boolean,
  missing: LLMResponse
): LLMBackend {
  return {
    async respond(config: Config): Promise<LLMResponse> {
      if (!hasRequirement(config)) {
        return { ...missing };
      }
      return {
        explanation: `${name} integration placeholder`,
        warnings: `${name} API integration not yet implemented.`,
        additionalInfo: USE_SIMULATION
      };
    }
  };
}

export const openAIBackend = pendingBackend('OpenAI', config => Boolean(config.apiKey), {
  explanation: 'OpenAI provider selected but no API key configured.',
  warnings: 'Set LOCALHELP_API_KEY environment variable with your OpenAI API key.',
  additionalInfo: 'Example: export LOCALHELP_API_KEY=sk-...'
});

export const anthropicBackend = pendingBackend('Anthropic', config => Boolean(config.apiKey), {
  explanation: 'Anthropic provider selected but no API key configured.',
  warnings: 'Set LOCALHELP_API_KEY environment variable with your Anthropic API key.',
  additionalInfo: 'Example: export LOCALHELP_API_KEY=sk-ant-...'
});

export const localBackend = pendingBackend('Local LLM', config => Boolean(config.apiUrl), {
  explanation: 'Local LLM provider selected but no API URL configured.',
  warnings: 'Set LOCALHELP_API_URL environment variable with your local LLM endpoint.',
  additionalInfo: 'Example: export LOCALHELP_API_URL=http://localhost:11434'
});
