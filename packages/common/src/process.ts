/**
 * External process runner
 *
 * Resolves with a result for every outcome: missing binary, non-zero exit
 * and timeout all come back as `ok: false` with a descriptive error.
 */

import { execFile, type ExecFileException } from 'node:child_process';
import { ProcessError, TimeoutError } from './errors.js';

export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;

const MAX_BUFFER = 10 * 1024 * 1024;

export interface RunCommandOptions {
  cwd?: string;
  timeoutMs?: number;
  /** Bytes allowed on stdout or stderr before the child is killed */
  maxBuffer?: number;
}

export interface CommandResult {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  error?: ProcessError | TimeoutError;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

function describeFailure(
  command: string,
  error: ExecFileException,
  stdout: string,
  stderr: string,
  limits: { timeoutMs: number; maxBuffer: number }
): CommandResult {
  // The child is killed with SIGTERM here too, so this goes before the timeout check
  if (error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
    return {
      ok: false,
      exitCode: null,
      stdout,
      stderr,
      timedOut: false,
      error: new ProcessError(`${command} output exceeded ${limits.maxBuffer} bytes`, { command }),
    };
  }

  if (error.killed && error.signal === 'SIGTERM') {
    return {
      ok: false,
      exitCode: null,
      stdout,
      stderr,
      timedOut: true,
      error: new TimeoutError(`${command} timed out after ${limits.timeoutMs}ms`, limits.timeoutMs),
    };
  }

  if (error.code === 'ENOENT') {
    return {
      ok: false,
      exitCode: null,
      stdout,
      stderr,
      timedOut: false,
      error: new ProcessError(`${command}: command not found`, { command }),
    };
  }

  const exitCode = typeof error.code === 'number' ? error.code : null;
  const message = exitCode !== null
    ? `${command} exited with code ${exitCode}`
    : `${command} failed: ${error.message}`;

  return {
    ok: false,
    exitCode,
    stdout,
    stderr,
    timedOut: false,
    error: new ProcessError(message, {
      command,
      ...(exitCode !== null && { exitCode }),
    }),
  };
}

/**
 * Run a binary with arguments (no shell), bounded by a wall-clock timeout
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const maxBuffer = options.maxBuffer ?? MAX_BUFFER;

  return new Promise(resolve => {
    execFile(
      command,
      [...args],
      {
        cwd: options.cwd,
        timeout: timeoutMs,
        maxBuffer,
        encoding: 'utf-8',
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ ok: true, exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        resolve(describeFailure(command, error, stdout, stderr, { timeoutMs, maxBuffer }));
      }
    );
  });
};
