/**
 * Debug Logger
 *
 * Diagnostic output goes to stderr in gray so it never mixes with the answer
 * printed on stdout. Enabled by LOCALHELP_DEV.
 */

import chalk from 'chalk';

export interface Logger {
  readonly enabled: boolean;
  debug(scope: string, message: string): void;
  /** Logs the first `limit` characters of a long value. */
  preview(scope: string, label: string, value: string, limit: number): void;
}

export function createLogger(enabled: boolean): Logger {
  return {
    enabled,
    debug(scope: string, message: string): void {
      if (!enabled) return;
      console.error(chalk.gray(`[DEBUG] ${scope}: ${message}`));
    },
    preview(scope: string, label: string, value: string, limit: number): void {
      if (!enabled) return;
      console.error(chalk.gray(`[DEBUG] ${scope}: ${label}: ${value.slice(0, limit)}...`));
    },
  };
}

export const silentLogger: Logger = createLogger(false);
