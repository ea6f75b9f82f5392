/**
 * Terminal Display Module
 *
 * Everything the user sees on stdout: documentation, the structured AI
 * answer, execution output, and the usage and error boxes.
 */

import boxen, { type Options as BoxenOptions } from 'boxen';
import chalk from 'chalk';
import type { LLMResponse } from '../core/responseParser.js';

/* ─────────────────────────────  Boxen Presets  ──────────────────────────── */

/**
 * Interface for box preset configuration
 */
export interface BoxPreset {
  padding: number;
  margin: number;
  borderStyle: BoxenOptions['borderStyle'];
  width: number;
  title?: string;
}

export interface BoxPresets {
  USAGE: BoxPreset;
  ERROR: BoxPreset;
}

export const BOX: BoxPresets = {
  USAGE: { padding: 0.5, margin: 0.5, borderStyle: 'round', width: 75, title: 'localhelp' },
  ERROR: { padding: 0.5, margin: 0.5, borderStyle: 'round', width: 75, title: 'Error' }
};

export const RULE = '═'.repeat(27);
export const THIN_RULE = '─'.repeat(25);

/* ─────────────────────────  Usage & Errors  ─────────────────────────── */

export const USAGE_LINES = [
  'Usage: help <command> [subcommand] [args...] [\'query\']',
  'Example: help git reset \'I want to unstage changes but keep them\'',
  'Example: help docker ps \'show only running containers\''
];

export function displayUsage(): void {
  console.log(boxen(USAGE_LINES.join('\n'), BOX.USAGE));
}

export function displayError(message: string): void {
  console.error(boxen(chalk.red(message), BOX.ERROR));
}

/* ─────────────────────────  Documentation  ─────────────────────────── */

export function displayDocumentation(command: string, content: string): void {
  console.log(chalk.bold(`📖 Documentation for ${command}:`));
  console.log('═'.repeat(24));
  console.log(content);
}

export function displayDocumentationMissing(command: string, hasQuery: boolean): void {
  if (hasQuery) {
    console.log(chalk.blue(`ℹ️  No man page or help content found for '${command}', querying LLM without documentation.`));
    return;
  }
  console.log(chalk.red(`❌ No documentation found for '${command}' and no query provided.`));
  console.log(`Usage: help ${command} 'your question here'`);
}

/* ─────────────────────────  AI Response  ─────────────────────────── */

/**
 * The recommended command, unless the model declined to give one
 */
export function recommendedCommandOf(response: LLMResponse): string | undefined {
  const command = response.recommendedCommand;
  return command !== undefined && command !== 'NONE' ? command : undefined;
}

function isPresent(value: string | undefined): value is string {
  return value !== undefined && value !== 'NONE';
}

/**
 * Prints the four fields of an answer under emoji labels
 */
export function displayLLMResponse(response: LLMResponse): void {
  console.log(`\n${chalk.bold('🤖 AI Assistant Response:')}`);
  console.log(RULE);

  console.log(`\n${chalk.bold('📋 EXPLANATION:')}\n${response.explanation}`);

  const command = recommendedCommandOf(response);
  if (command !== undefined) {
    console.log(`\n${chalk.bold('💻 RECOMMENDED COMMAND:')}\n${chalk.cyan(command)}`);
  }
  if (isPresent(response.warnings)) {
    console.log(`\n${chalk.bold('⚠️  WARNINGS:')}\n${chalk.yellow(response.warnings)}`);
  }
  if (isPresent(response.additionalInfo)) {
    console.log(`\n${chalk.bold('💡 ADDITIONAL INFO:')}\n${response.additionalInfo}`);
  }

  console.log(`\n${RULE}`);
}

/* ─────────────────────────  Command Execution  ─────────────────────────── */

export function displayExecutePrompt(command: string): void {
  console.log(`\n${chalk.bold('🚀 Execute Command?')}`);
  console.log(`Command: ${chalk.cyan(command)}`);
}

/**
 * Announces a command just before it runs
 */
export function echoCommand(command: string): void {
  console.log(`\n⚡ Executing: ${chalk.blueBright.bold(command)}`);
  console.log(THIN_RULE);
}

export function displayCommandOutput(stdout: string, stderr: string): void {
  if (stdout.length > 0) {
    console.log(`\n📤 Output:\n${stdout.trimEnd()}`);
  }
  if (stderr.length > 0) {
    console.log(`\n📤 Error output:\n${stderr.trimEnd()}`);
  }
}

export function displayCommandStatus(exitCode: number | null, signal: NodeJS.Signals | null): void {
  if (exitCode === 0) {
    console.log(chalk.green('\n✅ Command executed successfully!'));
  } else if (exitCode === null) {
    console.log(chalk.red(`\n❌ Command terminated by signal: ${signal ?? 'unknown'}`));
  } else {
    console.log(chalk.red(`\n❌ Command failed with exit code: ${exitCode}`));
  }
}
