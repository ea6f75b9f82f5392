/**
 * CLI Tools Module
 *
 * Subprocess execution for the whole application: documentation lookups,
 * the `whoami` and keychain helpers, and the final user-approved command.
 *
 * Commands are spawned directly (never through a shell) with stdin ignored,
 * and each captured stream is capped so a runaway child cannot exhaust memory.
 */

import { spawn } from 'child_process';
import { LocalHelpError, LocalHelpErrorCode } from './errors.js';

/** 1 MiB per captured stream. */
export const MAX_OUTPUT_BYTES = 1024 * 1024;

/* ───────────────────────── Types ────────────────────────────── */

/**
 * Result of a finished child process
 */
export interface CommandResult {
  /** Null when the child was terminated by a signal. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  maxOutputBytes?: number;
  env?: NodeJS.ProcessEnv;
}

/**
 * Anything that can run a command and report its captured output.
 * Rejects with SPAWN_FAILED when the child cannot be started or overflows.
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: RunOptions
) => Promise<CommandResult>;

/* ───────────────────────── Bounded Capture ────────────────────────────── */

class BoundedBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  /** Returns false once the limit would be exceeded. */
  push(chunk: Buffer): boolean {
    if (this.size + chunk.length > this.limit) return false;
    this.chunks.push(chunk);
    this.size += chunk.length;
    return true;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/* ───────────────────────── Command Execution ────────────────────────────── */

/**
 * Spawns `file` with `args`, waits for it to exit and returns its output.
 * A non-zero exit status is not an error; callers inspect `exitCode`.
 */
export const runCommand: CommandRunner = (file, args, options = {}) => {
  const limit = options.maxOutputBytes ?? MAX_OUTPUT_BYTES;

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(file, [...args], {
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout = new BoundedBuffer(limit);
    const stderr = new BoundedBuffer(limit);
    let overflow: LocalHelpError | null = null;
    let settled = false;

    // The 'error' and 'close' listeners stay attached: both ignore events
    // after settling, and an 'error' without a listener would throw.
    const release = (): void => {
      child.stdout.removeAllListeners('data');
      child.stderr.removeAllListeners('data');
    };

    const onOverflow = (stream: 'stdout' | 'stderr'): void => {
      if (overflow) return;
      overflow = new LocalHelpError(
        LocalHelpErrorCode.SPAWN_FAILED,
        `${stream} of ${file} exceeded ${limit} bytes`,
        { file, limit }
      );
      child.kill();
    };

    child.stdout.on('data', (chunk: Buffer) => {
      if (!stdout.push(chunk)) onOverflow('stdout');
    });
    child.stderr.on('data', (chunk: Buffer) => {
      if (!stderr.push(chunk)) onOverflow('stderr');
    });

    child.on('error', (error: Error) => {
      if (settled) return;
      settled = true;
      release();
      reject(new LocalHelpError(
        LocalHelpErrorCode.SPAWN_FAILED,
        `Failed to run ${file}: ${error.message}`,
        { file }
      ));
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      release();
      if (overflow) {
        reject(overflow);
        return;
      }
      resolve({
        exitCode: code,
        signal,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
      });
    });
  });
};
