/**
 * OpenRouter Executor Module
 *
 * Sends the prompt to OpenRouter's chat completions endpoint through the
 * official OpenAI JavaScript SDK, pointed at OpenRouter's baseURL.
 * One request, no retries: any failure is reported to the caller.
 */

import OpenAI, { type ClientOptions } from 'openai';
import type { Config } from '../../utils/env.js';
import { LocalHelpError, LocalHelpErrorCode } from '../../utils/errors.js';
import { DEFAULT_OPENROUTER_MODEL } from '../../utils/providerConfig.js';
import { parseStructuredResponse, type LLMResponse } from '../responseParser.js';
import type { BackendContext, LLMBackend } from './types.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/**
 * Request options sent with every completion
 */
export const COMPLETION_OPTIONS = {
  temperature: 0.7,
  max_tokens: 1000
} as const;

/**
 * Creates an OpenAI client for OpenRouter
 * @param apiKey - OpenRouter API key
 * @param fetch - Optional fetch implementation (used by tests)
 */
function createOpenRouterClient(apiKey: string, fetch?: ClientOptions['fetch']): OpenAI {
  const options: ClientOptions = {
    apiKey,
    baseURL: OPENROUTER_BASE_URL,
    maxRetries: 0
  };
  if (fetch) {
    options.fetch = fetch;
  }
  return new OpenAI(options);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Pulls `choices[0].message.content` out of a completion body
 * @throws {LocalHelpError} INVALID_JSON_RESPONSE if the body has another shape
 */
export function extractMessageContent(body: unknown): string {
  if (!isRecord(body) || !Array.isArray(body.choices)) {
    throw new LocalHelpError(LocalHelpErrorCode.INVALID_JSON_RESPONSE, 'Response has no choices array');
  }
  if (body.choices.length === 0) {
    throw new LocalHelpError(LocalHelpErrorCode.INVALID_JSON_RESPONSE, 'No choices in OpenRouter response');
  }

  const choice: unknown = body.choices[0];
  const message = isRecord(choice) ? choice.message : undefined;
  const content = isRecord(message) ? message.content : undefined;
  if (typeof content !== 'string') {
    throw new LocalHelpError(LocalHelpErrorCode.INVALID_JSON_RESPONSE, 'First choice has no message content');
  }
  return content;
}

/**
 * Performs the chat completion request and returns the raw reply text
 */
export async function makeOpenRouterRequest(
  apiKey: string,
  model: string,
  prompt: string,
  context: BackendContext
): Promise<string> {
  const client = createOpenRouterClient(apiKey, context.fetch);

  const requestParams: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
    model,
    messages: [{ role: 'user', content: prompt }],
    ...COMPLETION_OPTIONS
  };

  context.logger.debug('openrouter', `Sending request to ${OPENROUTER_BASE_URL} with model ${model}`);

  let body: unknown;
  try {
    body = await client.chat.completions.create(requestParams);
  } catch (error) {
    if (error instanceof OpenAI.APIError) {
      context.logger.debug('openrouter', `Request failed with status ${error.status ?? 'none'}`);
      throw new LocalHelpError(
        LocalHelpErrorCode.API_REQUEST_FAILED,
        `OpenRouter API request failed${error.status ? ` with status ${error.status}` : ''}: ${error.message}`,
        { status: error.status }
      );
    }
    if (error instanceof SyntaxError) {
      throw new LocalHelpError(
        LocalHelpErrorCode.INVALID_JSON_RESPONSE,
        `Failed to parse OpenRouter JSON response: ${error.message}`
      );
    }
    throw error;
  }

  return extractMessageContent(body);
}

/**
 * Returned instead of a request when no API key is configured
 */
const MISSING_KEY_RESPONSE: LLMResponse = {
  explanation: 'OpenRouter provider selected but no API key configured.',
  warnings: 'Set LOCALHELP_API_KEY environment variable with your OpenRouter API key.',
  additionalInfo: 'Get your key at https://openrouter.ai/keys. Example: export LOCALHELP_API_KEY=sk-or-...'
};

export const openRouterBackend: LLMBackend = {
  async respond(config: Config, prompt: string, context: BackendContext): Promise<LLMResponse> {
    if (!config.apiKey) {
      return { ...MISSING_KEY_RESPONSE };
    }

    const model = config.modelName ?? DEFAULT_OPENROUTER_MODEL;

    const text = await makeOpenRouterRequest(config.apiKey, model, prompt, context);
    context.logger.debug('openrouter', `Response received, length: ${text.length}`);
    context.logger.preview('openrouter', 'Raw response preview', text, 200);
    return parseStructuredResponse(text);
  }
};
