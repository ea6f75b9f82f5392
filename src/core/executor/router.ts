/**
 * Provider Router Module
 *
 * Routes a prompt to the backend selected by the configured provider.
 * Network and parse failures from a backend propagate unchanged; canned
 * responses for missing configuration are ordinary return values.
 */

import type { Config } from '../../utils/env.js';
import { getProviderDisplayName, PROVIDERS, type Provider } from '../../utils/providerConfig.js';
import { formatStructuredReply, type LLMResponse } from '../responseParser.js';
import { openRouterBackend } from './openai.js';
import { anthropicBackend, localBackend, openAIBackend } from './placeholders.js';
import { simulationBackend } from './simulation.js';
import type { BackendContext, LLMBackend } from './types.js';

const BACKENDS: Record<Provider, LLMBackend> = {
  [PROVIDERS.OPENROUTER]: openRouterBackend,
  [PROVIDERS.OPENAI]: openAIBackend,
  [PROVIDERS.ANTHROPIC]: anthropicBackend,
  [PROVIDERS.LOCAL]: localBackend,
  [PROVIDERS.SIMULATION]: simulationBackend
};

export function getBackend(provider: Provider): LLMBackend {
  return BACKENDS[provider];
}

/**
 * Gets the model's answer for a prompt using the configured provider
 * @param config - Runtime configuration
 * @param prompt - The full prompt text
 * @param context - Logger and transport overrides
 * @returns The parsed answer
 */
export async function getLLMResponse(
  config: Config,
  prompt: string,
  context: BackendContext
): Promise<LLMResponse> {
  const { logger } = context;
  logger.debug('router', `Getting LLM response using provider: ${getProviderDisplayName(config.provider)}`);
  logger.preview('router', 'LLM prompt preview', prompt, 500);

  const response = await getBackend(config.provider).respond(config, prompt, context);

  logger.debug('router', 'LLM response received successfully');
  logger.preview('router', 'Explanation preview', response.explanation, 300);
  logger.debug('router', `Structured reply:\n${formatStructuredReply(response)}`);
  return response;
}
