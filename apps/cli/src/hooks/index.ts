/**
 * Hook registry
 */

import { backupHook } from './backup.js';
import { commitCheckHook } from './commit-check.js';
import { dangerousCommandHook } from './dangerous-command.js';
import { lintHook } from './lint.js';
import { notifyHook } from './notify.js';
import { protectedPathHook } from './protected-path.js';
import type { HookDefinition } from './types.js';

export const HOOK_NAMES = [
  'dangerous-command',
  'protected-path',
  'commit-check',
  'lint',
  'notify',
  'backup',
] as const;

export type HookName = (typeof HOOK_NAMES)[number];

export const HOOKS: Readonly<Record<HookName, HookDefinition>> = Object.freeze({
  'dangerous-command': {
    description: 'PreToolUse/Bash: deny destructive shell commands',
    handler: dangerousCommandHook,
  },
  'protected-path': {
    description: 'PreToolUse/Write|Edit: deny writes to protected paths',
    handler: protectedPathHook,
  },
  'commit-check': {
    description: 'PreToolUse/Bash: branch, secret and lint checks before git commit',
    handler: commitCheckHook,
  },
  lint: {
    description: 'PostToolUse/Write|Edit: lint the edited file',
    handler: lintHook,
  },
  notify: {
    description: 'Notification: show a desktop notification',
    handler: notifyHook,
  },
  backup: {
    description: 'PreToolUse/Write|Edit: back up the file before it changes',
    handler: backupHook,
  },
});

export function isHookName(name: string): name is HookName {
  return HOOK_NAMES.some(hook => hook === name);
}

export type { HookContext, HookDefinition, HookHandler } from './types.js';
