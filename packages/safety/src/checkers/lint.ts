/**
 * Lint / style check by file extension
 */

import path from 'node:path';
import { runCommand, truncate, type CommandRunner } from '@hook-gate/common';
import type { CheckOutcome } from '../types.js';

export interface LinterSpec {
  readonly command: string;
  readonly args: readonly string[];
}

export type LinterTable = Readonly<Record<string, LinterSpec>>;

const ESLINT: LinterSpec = { command: 'eslint', args: [] };
const PRETTIER_CHECK: LinterSpec = { command: 'prettier', args: ['--check'] };

export const DEFAULT_LINTERS: LinterTable = {
  '.py': { command: 'ruff', args: ['check'] },
  '.js': ESLINT,
  '.jsx': ESLINT,
  '.mjs': ESLINT,
  '.cjs': ESLINT,
  '.ts': ESLINT,
  '.tsx': ESLINT,
  '.html': PRETTIER_CHECK,
  '.css': PRETTIER_CHECK,
  '.scss': PRETTIER_CHECK,
  '.md': PRETTIER_CHECK,
};

/** Lines of linter output kept per failing run */
const MAX_REPORT_LINES = 20;

export interface LintOptions {
  linters: LinterTable;
  timeoutMs: number;
  cwd?: string;
  runner?: CommandRunner;
}

/**
 * Look up the linter for a file by its (lower-cased) extension
 */
export function linterFor(filePath: string, linters: LinterTable): LinterSpec | undefined {
  const ext = path.extname(filePath).toLowerCase();
  return ext ? linters[ext] : undefined;
}

function linterKey(spec: LinterSpec): string {
  return [spec.command, ...spec.args].join(' ');
}

/**
 * Group files by the linter that handles them; files without one are dropped
 */
export function groupByLinter(
  files: readonly string[],
  linters: LinterTable
): Array<{ linter: LinterSpec; files: string[] }> {
  const groups = new Map<string, { linter: LinterSpec; files: string[] }>();

  for (const file of files) {
    const linter = linterFor(file, linters);
    if (!linter) continue;

    const key = linterKey(linter);
    const group = groups.get(key);
    if (group) {
      group.files.push(file);
    } else {
      groups.set(key, { linter, files: [file] });
    }
  }

  return Array.from(groups.values());
}

function summarizeOutput(stdout: string, stderr: string): string[] {
  return `${stdout}\n${stderr}`
    .split(/\r?\n/)
    .map(line => line.trimEnd())
    .filter(line => line.length > 0)
    .slice(0, MAX_REPORT_LINES)
    .map(line => `  ${truncate(line, 200)}`);
}

/**
 * Run every applicable linter over the files, one run per linter. Timeouts,
 * missing binaries and non-zero exits are failures.
 */
export async function lintFiles(files: readonly string[], options: LintOptions): Promise<CheckOutcome> {
  const groups = groupByLinter(files, options.linters);
  if (groups.length === 0) {
    return { passed: true, message: 'No files to lint' };
  }

  const runner = options.runner ?? runCommand;
  const failures: string[] = [];
  let linted = 0;

  for (const { linter, files: groupFiles } of groups) {
    linted += groupFiles.length;
    const result = await runner(linter.command, [...linter.args, ...groupFiles], {
      cwd: options.cwd,
      timeoutMs: options.timeoutMs,
    });

    if (!result.ok) {
      failures.push(result.error?.message ?? `${linter.command} failed`);
      failures.push(...summarizeOutput(result.stdout, result.stderr));
    }
  }

  if (failures.length === 0) {
    return { passed: true, message: `No lint issues in ${linted} file(s)` };
  }
  return { passed: false, message: ['Lint issues found:', ...failures].join('\n') };
}
