#!/usr/bin/env node
/**
 * Main CLI Application Entry Point
 *
 * `help <command> [subcommand] [args...] ['query']`
 *
 * Loads the configuration once, then hands the raw arguments to the command
 * help pipeline. The tool has no flags of its own: everything after the
 * program name, `--help` included, belongs to the target command or the query.
 */

import chalk from 'chalk';
import { hideBin } from 'yargs/helpers';

import { processCommand } from '../core/index.js';
import { readArguments } from './arguments.js';
import { displayError, displayUsage } from '../ui/terminalUI.js';
import { loadConfig, isDebugEnabled } from '../utils/env.js';
import { LocalHelpErrorCode, errorMessage, isLocalHelpError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

/* ───────────────────────────────  Main  ──────────────────────────────── */

(async function main(): Promise<void> {
  const args = await readArguments(hideBin(process.argv));

  if (args.length === 0) {
    displayUsage();
    return;
  }

  const config = await loadConfig({ logger: createLogger(isDebugEnabled()) });
  await processCommand(args, config);
})().catch((err: unknown) => {
  if (isLocalHelpError(err, LocalHelpErrorCode.NO_COMMAND)) {
    displayUsage();
  } else {
    displayError(errorMessage(err));
  }
  if (isDebugEnabled() && err instanceof Error && err.stack) {
    console.error(chalk.gray(err.stack));
  }
  process.exitCode = 1;
});
