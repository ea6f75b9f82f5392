import type { ClientOptions } from 'openai';
import type { Config } from '../../utils/env.js';
import type { Logger } from '../../utils/logger.js';
import type { LLMResponse } from '../responseParser.js';

/**
 * Per-call collaborators handed to a backend
 */
export interface BackendContext {
  logger: Logger;
  /** Replaces the HTTP transport of the OpenAI client. */
  fetch?: ClientOptions['fetch'];
}

/**
 * Common contract of every provider backend
 */
export interface LLMBackend {
  respond(config: Config, prompt: string, context: BackendContext): Promise<LLMResponse>;
}
