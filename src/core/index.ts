/**
 * Command Help Pipeline
 *
 * Runs one invocation end to end:
 *   split arguments → find documentation → build prompt → ask the model
 *   → show the answer → offer to run the recommended command.
 *
 * Collaborators (subprocesses, confirmation, HTTP transport) arrive through
 * PipelineDeps so the flow can run against stand-ins.
 */

import type { ClientOptions } from 'openai';
import {
  displayDocumentation,
  displayDocumentationMissing,
  displayLLMResponse,
  recommendedCommandOf
} from '../ui/terminalUI.js';
import { askYesNo } from '../ui/prompt.js';
import { runCommand, type CommandRunner } from '../utils/cliTools.js';
import type { Config } from '../utils/env.js';
import { LocalHelpErrorCode, isLocalHelpError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { parseCommandArgs, type CommandInfo } from './commandArgs.js';
import { getDocumentation } from './documentation.js';
import { confirmAndExecute, type Confirm } from './execution.js';
import { getLLMResponse } from './executor/router.js';
import { buildCommandHelpPrompt } from './promptTemplates/commandHelp.js';
import type { LLMResponse } from './responseParser.js';
import { startThinking, type StopFunction } from './ui/thinking.js';

/**
 * Collaborators of the pipeline
 */
export interface PipelineDeps {
  run: CommandRunner;
  confirm: Confirm;
  logger: Logger;
  /** Show a spinner while waiting on the model. */
  showProgress: boolean;
  fetch?: ClientOptions['fetch'];
}

/**
 * Real collaborators for a terminal session
 */
export function createDefaultDeps(config: Config): PipelineDeps {
  return {
    run: runCommand,
    confirm: askYesNo,
    logger: createLogger(config.debugMode),
    showProgress: Boolean(process.stdout.isTTY)
  };
}

/**
 * Asks the model about a command and shows the answer.
 * If a command is recommended, offers to run it.
 */
async function processWithLLM(
  info: CommandInfo,
  query: string,
  documentation: string | undefined,
  config: Config,
  deps: PipelineDeps
): Promise<LLMResponse> {
  const prompt = buildCommandHelpPrompt(info.command, info.args, query, documentation);

  const stopThinking: StopFunction = deps.showProgress ? startThinking() : () => {};
  let response: LLMResponse;
  try {
    response = await getLLMResponse(config, prompt, { logger: deps.logger, fetch: deps.fetch });
  } finally {
    stopThinking();
  }

  displayLLMResponse(response);

  const command = recommendedCommandOf(response);
  if (command !== undefined) {
    await confirmAndExecute(command, deps);
  }
  return response;
}

/**
 * Handles one `help` invocation
 * @param args - CLI arguments after the program name
 * @param config - Runtime configuration
 * @param deps - Collaborators; defaults to the real terminal
 * @returns The model's answer, or undefined when the model was not consulted
 * @throws {LocalHelpError} NO_COMMAND, API_REQUEST_FAILED or INVALID_JSON_RESPONSE
 */
export async function processCommand(
  args: readonly string[],
  config: Config,
  deps: PipelineDeps = createDefaultDeps(config)
): Promise<LLMResponse | undefined> {
  const info = parseCommandArgs(args);
  const { logger } = deps;

  logger.debug('pipeline', `Attempting to fetch documentation for command: ${info.command}`);

  let documentation: string;
  try {
    documentation = await getDocumentation(info.command, info.args, { run: deps.run, logger });
  } catch (error) {
    if (!isLocalHelpError(error, LocalHelpErrorCode.MAN_PAGE_NOT_FOUND)) throw error;

    logger.debug('pipeline', `No man page or help content found for command: ${info.command}`);
    displayDocumentationMissing(info.command, info.query !== undefined);
    if (info.query === undefined) return undefined;
    return processWithLLM(info, info.query, undefined, config, deps);
  }

  if (info.query === undefined) {
    displayDocumentation(info.command, documentation);
    return undefined;
  }
  return processWithLLM(info, info.query, documentation, config, deps);
}
