/**
 * PostToolUse/Write|Edit: run the linter for the edited file
 *
 * Advisory only; problems are reported on stderr.
 */

import { lintFiles, linterFor } from '@hook-gate/safety';
import { silent } from './output.js';
import type { HookHandler } from './types.js';

const EDIT_TOOLS: readonly string[] = ['Write', 'Edit', 'MultiEdit'];

export const lintHook: HookHandler = async (input, { gate, log, runner }) => {
  const toolName = input.tool_name ?? 'unknown tool';
  const filePath = input.tool_input?.file_path;

  if (!EDIT_TOOLS.includes(toolName) || !filePath) {
    log.info(`Skipped ${toolName}`);
    return silent();
  }

  const { linters, lintTimeoutMs } = gate.config;
  if (!linterFor(filePath, linters)) {
    log.info(`No linter for ${filePath}`);
    return silent();
  }

  const outcome = await lintFiles([filePath], {
    linters,
    timeoutMs: lintTimeoutMs,
    cwd: input.cwd,
    runner,
  });

  if (outcome.passed) {
    log.append('ALLOW', `${filePath}: ${outcome.message}`);
    return silent();
  }

  log.warn(`${filePath}: ${outcome.message}`);
  return {
    messages: [`[lint] ${filePath}`, ...outcome.message.split('\n')],
  };
};
