/**
 * PreToolUse/Bash: deny destructive shell commands
 */

import { truncate } from '@hook-gate/common';
import { silent, toHookOutput } from './output.js';
import type { HookHandler } from './types.js';

export const dangerousCommandHook: HookHandler = async (input, { gate, log }) => {
  const command = input.tool_input?.command;
  if (input.tool_name !== 'Bash' || command === undefined) {
    log.info(`Skipped ${input.tool_name ?? 'unknown tool'}`);
    return silent();
  }

  const decision = gate.checkCommand(command);
  const logged = truncate(gate.redact(command), 200);

  if (decision.outcome === 'allow') {
    log.append('ALLOW', logged);
    return silent();
  }

  log.append('DENY', `${logged} [${decision.matchedRule ?? 'unknown rule'}]`);
  return {
    output: toHookOutput(input.hook_event_name, decision),
    messages: [],
  };
};
