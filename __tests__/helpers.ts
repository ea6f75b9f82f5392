import { vi } from 'vitest';
import type { CommandResult, CommandRunner } from '../src/utils/cliTools.js';

export function result(exitCode: number | null, stdout = '', stderr = ''): CommandResult {
  return { exitCode, signal: exitCode === null ? 'SIGTERM' : null, stdout, stderr };
}

export type Responder = (file: string, args: readonly string[]) => CommandResult | Error;

/**
 * A CommandRunner that answers from `responder` and records every argv
 */
export function fakeRunner(responder: Responder): { run: CommandRunner; calls: string[][] } {
  const calls: string[][] = [];
  const run: CommandRunner = async (file, args) => {
    calls.push([file, ...args]);
    const outcome = responder(file, args);
    if (outcome instanceof Error) throw outcome;
    return outcome;
  };
  return { run, calls };
}

/**
 * Captures console.log / console.error output for the current test
 */
export function captureConsole(): { text: () => string; lines: () => string[]; errors: () => string } {
  const out: string[] = [];
  const err: string[] = [];
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    out.push(args.map(String).join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    err.push(args.map(String).join(' '));
  });
  return {
    text: () => out.join('\n'),
    lines: () => out.join('\n').split('\n'),
    errors: () => err.join('\n'),
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function completion(content: string | null): unknown {
  return {
    id: 'gen-test',
    object: 'chat.completion',
    created: 1700000000,
    model: 'anthropic/claude-3.7-sonnet',
    choices: [{ index: 0, finish_reason: 'stop', message: { role: 'assistant', content } }],
  };
}

/**
 * Returns whatever `fn` throws, or undefined when it returns normally
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
