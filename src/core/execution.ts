/**
 * Confirmation & Execution Gate
 *
 * A recommended command only runs after the user says yes. It is split on
 * spaces and spawned directly, so no shell expansion, pipes or quoting apply.
 */

import chalk from 'chalk';
import { askYesNo } from '../ui/prompt.js';
import {
  displayCommandOutput,
  displayCommandStatus,
  displayExecutePrompt,
  echoCommand
} from '../ui/terminalUI.js';
import { runCommand, type CommandRunner } from '../utils/cliTools.js';
import { LocalHelpError, LocalHelpErrorCode, errorMessage, isLocalHelpError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export type Confirm = (question: string) => Promise<boolean>;

export interface ExecutionDeps {
  run?: CommandRunner;
  confirm?: Confirm;
  logger?: Logger;
}

/**
 * Splits a command line on single spaces, dropping empty fragments
 * @throws {LocalHelpError} NO_COMMAND_TO_EXECUTE when nothing is left
 */
export function splitCommand(command: string): string[] {
  const argv = command.split(' ').filter(part => part.length > 0);
  if (argv.length === 0) {
    throw new LocalHelpError(LocalHelpErrorCode.NO_COMMAND_TO_EXECUTE, 'No command to execute');
  }
  return argv;
}

/**
 * Runs a command without a shell and prints what it wrote.
 * A non-zero exit status is reported, not thrown.
 */
export async function executeCommand(command: string, deps: ExecutionDeps = {}): Promise<void> {
  const run = deps.run ?? runCommand;
  const logger = deps.logger ?? silentLogger;

  let argv: string[];
  try {
    argv = splitCommand(command);
  } catch (error) {
    if (isLocalHelpError(error, LocalHelpErrorCode.NO_COMMAND_TO_EXECUTE)) {
      console.log(chalk.red('❌ Error: No command to execute'));
      return;
    }
    throw error;
  }

  echoCommand(command);
  const [file, ...args] = argv;
  logger.debug('execute', `Spawning ${file} with ${args.length} argument(s)`);

  try {
    const result = await run(file, args, { env: process.env });
    displayCommandOutput(result.stdout, result.stderr);
    displayCommandStatus(result.exitCode, result.signal);
  } catch (error) {
    console.log(chalk.red(`❌ Error executing command: ${errorMessage(error)}`));
  }
}

/**
 * Asks whether to run `command` and runs it on a yes
 * @returns Whether the command was run
 */
export async function confirmAndExecute(command: string, deps: ExecutionDeps = {}): Promise<boolean> {
  const confirm = deps.confirm ?? askYesNo;

  displayExecutePrompt(command);
  const approved = await confirm('Run this command?');
  if (!approved) {
    console.log(chalk.gray('\n🚫 Command not executed.'));
    return false;
  }

  await executeCommand(command, deps);
  return true;
}
