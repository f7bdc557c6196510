/**
 * PreToolUse/Write|Edit: deny writes to protected paths
 */

import { WRITE_TOOLS } from '@hook-gate/safety';
import { silent, toHookOutput } from './output.js';
import type { HookHandler } from './types.js';

export const protectedPathHook: HookHandler = async (input, { gate, log }) => {
  const toolName = input.tool_name ?? 'unknown tool';
  const filePath = input.tool_input?.file_path ?? input.tool_input?.notebook_path;

  if (!WRITE_TOOLS.includes(toolName) || !filePath) {
    log.info(`Skipped ${toolName}`);
    return silent();
  }

  const decision = gate.checkPath(filePath);
  if (decision.outcome === 'allow') {
    log.append('ALLOW', `${toolName} ${filePath}`);
    return silent();
  }

  log.append('DENY', `${toolName} ${filePath} [${decision.matchedRule ?? 'unknown rule'}]`);
  return {
    output: toHookOutput(input.hook_event_name, decision),
    messages: [],
  };
};
