/**
 * Pre-commit checks: branch, secrets and lint, run in parallel
 */

import { runCommand, type CommandRunner } from '@hook-gate/common';
import { formatFinding, lintFiles } from './checkers/index.js';
import { runAll } from './dispatcher.js';
import { currentBranch, repoRoot, stagedDiff, stagedFiles } from './git.js';
import type { Gate } from './gate.js';
import type { CheckOutcome, DispatchResult, NamedCheck } from './types.js';

export interface CommitCheckOptions {
  cwd?: string;
  runner?: CommandRunner;
}

export function createCommitChecks(gate: Gate, options: CommitCheckOptions = {}): NamedCheck[] {
  const { config } = gate;
  const git = {
    cwd: options.cwd,
    timeoutMs: config.gitTimeoutMs,
    runner: options.runner ?? runCommand,
  };

  const branch = async (): Promise<CheckOutcome> => {
    const result = await currentBranch(git);
    if (!result.ok) {
      return { passed: false, message: `Could not determine branch: ${result.error}` };
    }

    const decision = gate.checkBranch(result.value);
    return decision.outcome === 'allow'
      ? { passed: true, message: `On branch ${result.value}` }
      : { passed: false, message: decision.reason ?? `Protected branch ${result.value}` };
  };

  const secrets = async (): Promise<CheckOutcome> => {
    const result = await stagedDiff(git);
    if (!result.ok) {
      return { passed: false, message: `Could not read staged diff: ${result.error}` };
    }

    const findings = gate.scanDiff(result.value);
    if (findings.length === 0) {
      return { passed: true, message: 'No secrets found in staged changes' };
    }
    return {
      passed: false,
      message: [
        'Possible secrets in staged changes:',
        ...findings.map(finding => `  ${formatFinding(finding)}`),
      ].join('\n'),
    };
  };

  const lint = async (): Promise<CheckOutcome> => {
    const result = await stagedFiles(git);
    if (!result.ok) {
      return { passed: false, message: `Could not list staged files: ${result.error}` };
    }
    if (result.value.length === 0) {
      return { passed: true, message: 'No files to lint' };
    }

    // Staged paths are relative to the repository root, not to the cwd
    const root = await repoRoot(git);
    if (!root.ok) {
      return { passed: false, message: `Could not find repository root: ${root.error}` };
    }

    return lintFiles(result.value, {
      linters: config.linters,
      timeoutMs: config.lintTimeoutMs,
      cwd: root.value,
      runner: git.runner,
    });
  };

  return [
    { name: 'branch', run: branch },
    { name: 'secrets', run: secrets },
    { name: 'lint', run: lint },
  ];
}

export function runCommitChecks(gate: Gate, options: CommitCheckOptions = {}): Promise<DispatchResult> {
  return runAll(createCommitChecks(gate, options), { maxWorkers: gate.config.maxWorkers });
}

/**
 * One line per check, failures followed by their detail lines
 */
export function formatCommitReport(result: DispatchResult): string[] {
  const lines: string[] = [];
  for (const check of result.results) {
    const [first = '', ...rest] = check.message.split('\n');
    lines.push(`${check.passed ? '✓' : '✗'} ${check.name}: ${first}`);
    lines.push(...rest);
  }
  lines.push(result.passed ? 'All commit checks passed' : 'Some commit checks failed');
  return lines;
}
