/**
 * Documentation Resolver
 *
 * Finds human-readable documentation for a command. The man page is tried
 * first; failing that, a fixed sequence of help-flag invocations, keeping the
 * first one whose output looks like help text. Strategies run one at a time
 * and the first success wins.
 */

import { runCommand, MAX_OUTPUT_BYTES, type CommandResult, type CommandRunner } from '../utils/cliTools.js';
import { LocalHelpError, LocalHelpErrorCode, errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface DocumentationOptions {
  run?: CommandRunner;
  logger?: Logger;
}

// `man` renders bold/underline with backspaces; `col -bx` strips them.
// The command is passed as $1 so it is never parsed by the shell.
// POSIX sh has no pipefail, so man's status is checked before the pipe.
export const MAN_SCRIPT = 'out=$(man "$1") || exit $?; printf \'%s\\n\' "$out" | col -bx';

// Help commands commonly exit 1 or 2 after printing usage
const ACCEPTED_HELP_EXIT_CODES = new Set([0, 1, 2]);

const HELP_MARKERS = [
  'Usage:',
  'usage:',
  'USAGE:',
  'Options:',
  'options:',
  'Commands:',
  'commands:',
  '--help',
  'Examples:',
  'Description:',
];

const MIN_HELP_LENGTH = 10;

/**
 * Whether captured output resembles help text
 */
export function looksLikeHelp(output: string): boolean {
  return output.length >= MIN_HELP_LENGTH && HELP_MARKERS.some(marker => output.includes(marker));
}

/**
 * The argv sequences tried after the man page, in order
 */
export function helpPatterns(command: string, args: readonly string[]): string[][] {
  const subcommand = args[0];
  return [
    [command, '--help'],
    [command, '-h'],
    subcommand !== undefined ? [command, subcommand, '--help'] : [command, '--help'],
    subcommand !== undefined ? [command, subcommand, '-h'] : [command, '-h'],
    [command, 'help'],
    [command],
  ];
}

async function tryManPage(command: string, run: CommandRunner, logger: Logger): Promise<string> {
  logger.debug('docs', `Executing man command for: ${command}`);
  const result = await run('sh', ['-c', MAN_SCRIPT, 'sh', command], { maxOutputBytes: MAX_OUTPUT_BYTES });

  if (result.exitCode !== 0) {
    logger.debug('docs', `Man command failed with exit code ${result.exitCode}: ${result.stderr.trim()}`);
    throw new LocalHelpError(LocalHelpErrorCode.MAN_PAGE_NOT_FOUND, `No man page for ${command}`);
  }
  return result.stdout;
}

async function tryHelpCommand(argv: readonly string[], run: CommandRunner, logger: Logger): Promise<string> {
  const [file, ...rest] = argv;
  logger.debug('docs', `Trying help pattern: ${argv.join(' ')}`);

  let result: CommandResult;
  try {
    result = await run(file, rest, { maxOutputBytes: MAX_OUTPUT_BYTES });
  } catch (error) {
    throw new LocalHelpError(LocalHelpErrorCode.HELP_COMMAND_FAILED, errorMessage(error));
  }

  if (result.exitCode === null || !ACCEPTED_HELP_EXIT_CODES.has(result.exitCode)) {
    logger.debug('docs', `Help command failed with exit code ${result.exitCode}: ${result.stderr.trim()}`);
    throw new LocalHelpError(LocalHelpErrorCode.HELP_COMMAND_FAILED, `${argv.join(' ')} exited with ${result.exitCode}`);
  }

  if (!looksLikeHelp(result.stdout)) {
    logger.debug('docs', `Output doesn't look like help content, length: ${result.stdout.length}`);
    throw new LocalHelpError(LocalHelpErrorCode.HELP_COMMAND_FAILED, `${argv.join(' ')} did not print help`);
  }

  return result.stdout;
}

async function tryHelpContent(
  command: string,
  args: readonly string[],
  run: CommandRunner,
  logger: Logger
): Promise<string> {
  for (const pattern of helpPatterns(command, args)) {
    try {
      return await tryHelpCommand(pattern, run, logger);
    } catch (error) {
      logger.debug('docs', errorMessage(error));
    }
  }
  throw new LocalHelpError(LocalHelpErrorCode.MAN_PAGE_NOT_FOUND, `No help content for ${command}`);
}

/**
 * Gets documentation for a command
 * @param command - The target command, e.g. "git"
 * @param args - Its arguments; `args[0]` is tried as a subcommand
 * @returns The man page or help output
 * @throws {LocalHelpError} MAN_PAGE_NOT_FOUND when every strategy fails
 */
export async function getDocumentation(
  command: string,
  args: readonly string[],
  options: DocumentationOptions = {}
): Promise<string> {
  const run = options.run ?? runCommand;
  const logger = options.logger ?? silentLogger;

  try {
    const manContent = await tryManPage(command, run, logger);
    logger.debug('docs', `Man page found, length: ${manContent.length} chars`);
    logger.preview('docs', 'Man page preview', manContent, 200);
    return manContent;
  } catch (error) {
    logger.debug('docs', `Man page not found (${errorMessage(error)}), trying help content`);
  }

  try {
    const helpContent = await tryHelpContent(command, args, run, logger);
    logger.debug('docs', `Help content found, length: ${helpContent.length} chars`);
    logger.preview('docs', 'Help content preview', helpContent, 200);
    return helpContent;
  } catch (error) {
    logger.debug('docs', 'No help content found either');
    throw error;
  }
}
