/**
 * Command Argument Splitting
 *
 * Separates `help <command> [args...] [query]` into the target command, the
 * arguments that belong to it, and the free-text question.
 */

import { LocalHelpError, LocalHelpErrorCode } from '../utils/errors.js';

/**
 * A parsed invocation
 */
export interface CommandInfo {
  readonly command: string;
  readonly args: readonly string[];
  /** Undefined when no question was asked. */
  readonly query?: string;
}

// Only consulted for the final argument
const QUERY_WORDS = ['I ', 'help', 'want', 'need', 'how'];

function isQueryStart(arg: string, isLast: boolean): boolean {
  if (arg.includes(' ')) return true;
  if (arg.startsWith("'") || arg.startsWith('"')) return true;
  return isLast && QUERY_WORDS.some(word => arg.includes(word));
}

/**
 * Removes one pair of matching surrounding quotes from a single argument
 */
export function stripQuotes(arg: string): string {
  if (arg.length < 2) return arg;
  const first = arg[0];
  if ((first === "'" || first === '"') && arg.endsWith(first)) {
    return arg.slice(1, -1);
  }
  return arg;
}

/**
 * Splits raw CLI arguments into a CommandInfo
 * @param args - Arguments after the program name; the first is the command
 * @throws {LocalHelpError} NO_COMMAND when `args` is empty
 */
export function parseCommandArgs(args: readonly string[]): CommandInfo {
  if (args.length === 0 || !args[0]) {
    throw new LocalHelpError(LocalHelpErrorCode.NO_COMMAND, 'No command given');
  }

  const [command, ...rest] = args;
  const queryStart = rest.findIndex((arg, i) => isQueryStart(arg, i === rest.length - 1));

  if (queryStart === -1) {
    return { command, args: rest };
  }

  return {
    command,
    args: rest.slice(0, queryStart),
    query: rest.slice(queryStart).map(stripQuotes).join(' '),
  };
}

/**
 * The command as the user would type it, e.g. "git reset"
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}
