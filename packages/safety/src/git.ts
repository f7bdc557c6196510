/**
 * Git queries used by the commit check
 */

import { runCommand, type CommandRunner } from '@hook-gate/common';

export const DEFAULT_GIT_TIMEOUT_MS = 5_000;

export interface GitOptions {
  cwd?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export type GitResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

async function git(args: string[], options: GitOptions): Promise<GitResult<string>> {
  const runner = options.runner ?? runCommand;
  const result = await runner('git', args, {
    cwd: options.cwd,
    timeoutMs: options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS,
  });

  if (!result.ok) {
    const detail = result.stderr.trim();
    const message = result.error?.message ?? 'git failed';
    return { ok: false, error: detail ? `${message}: ${detail}` : message };
  }
  return { ok: true, value: result.stdout };
}

/**
 * Detect `git commit` at the start of a command or after `&&` / `;`
 */
export function isCommitCommand(command: string): boolean {
  return /(?:^|&&\s*|;\s*)git\s+commit(?:\s|$)/.test(command.trim());
}

export async function currentBranch(options: GitOptions = {}): Promise<GitResult<string>> {
  const result = await git(['rev-parse', '--abbrev-ref', 'HEAD'], options);
  return result.ok ? { ok: true, value: result.value.trim() } : result;
}

/**
 * Top-level directory of the work tree. Paths git prints for the index are
 * relative to it, whatever the caller's cwd.
 */
export async function repoRoot(options: GitOptions = {}): Promise<GitResult<string>> {
  const result = await git(['rev-parse', '--show-toplevel'], options);
  return result.ok ? { ok: true, value: result.value.trim() } : result;
}

export async function stagedDiff(options: GitOptions = {}): Promise<GitResult<string>> {
  return git(['diff', '--cached', '--no-color', '-U0'], options);
}

export async function stagedFiles(options: GitOptions = {}): Promise<GitResult<string[]>> {
  const result = await git(['diff', '--cached', '--name-only', '--diff-filter=ACM'], options);
  if (!result.ok) return result;

  return {
    ok: true,
    value: result.value
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0),
  };
}
