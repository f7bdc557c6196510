/**
 * Hook handler types
 */

import type { CommandRunner, HookInput, HookLog, HookResult } from '@hook-gate/common';
import type { Gate } from '@hook-gate/safety';

export interface HookContext {
  gate: Gate;
  log: HookLog;
  runner: CommandRunner;
  platform: NodeJS.Platform;
  now: () => Date;
}

export type HookHandler = (input: HookInput, context: HookContext) => Promise<HookResult>;

export interface HookDefinition {
  description: string;
  handler: HookHandler;
}
