/**
 * Decision to hook output mapping
 */

import type { HookOutput, HookResult } from '@hook-gate/common';
import type { Decision } from '@hook-gate/safety';

/**
 * Only deny and ask produce a decision object; allow stays silent.
 */
export function toHookOutput(eventName: string, decision: Decision): HookOutput | undefined {
  if (decision.outcome === 'allow') {
    return undefined;
  }

  return {
    hookSpecificOutput: {
      hookEventName: eventName,
      permissionDecision: decision.outcome,
      permissionDecisionReason: decision.reason ?? decision.matchedRule ?? 'Matched a rule',
    },
  };
}

export function silent(): HookResult {
  return { messages: [] };
}
