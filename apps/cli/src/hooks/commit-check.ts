/**
 * PreToolUse/Bash on `git commit`: branch, secret and lint checks
 *
 * Findings never block. A failing check turns into an `ask` decision and
 * the full report goes to stderr.
 */

import { formatCommitReport, isCommitCommand, runCommitChecks } from '@hook-gate/safety';
import { silent, toHookOutput } from './output.js';
import type { HookHandler } from './types.js';

export const commitCheckHook: HookHandler = async (input, { gate, log, runner }) => {
  const command = input.tool_input?.command;
  if (input.tool_name !== 'Bash' || command === undefined || !isCommitCommand(command)) {
    log.info('Skipped: not a git commit');
    return silent();
  }

  const result = await runCommitChecks(gate, { cwd: input.cwd, runner });
  const report = formatCommitReport(result);

  if (result.passed) {
    log.append('ALLOW', 'All commit checks passed');
    return { messages: report };
  }

  const failed = result.results
    .filter(check => !check.passed)
    .sort((a, b) => a.name.localeCompare(b.name));
  const names = failed.map(check => check.name).join(', ');

  log.append('ASK', `Failed checks: ${names}`);
  return {
    output: toHookOutput(input.hook_event_name, {
      outcome: 'ask',
      reason: [
        `Commit checks failed: ${names}`,
        ...failed.map(check => `${check.name}: ${check.message}`),
      ].join('\n'),
      matchedRule: names,
    }),
    messages: report,
  };
};
