/**
 * Hook Commands Tests
 */

import { describe, it, expect } from 'vitest';
import { hookCommands } from './hook.js';

describe('Hook Commands', () => {
  const hook = hookCommands();

  it('creates hook parent command', () => {
    expect(hook.name()).toBe('hook');
    expect(hook.description()).toBe('Run a hook against the event payload on stdin');
  });

  it('has one subcommand per hook', () => {
    expect(hook.commands.map(c => c.name())).toEqual([
      'dangerous-command',
      'protected-path',
      'commit-check',
      'lint',
      'notify',
      'backup',
    ]);
  });

  it('describes each hook', () => {
    const dangerous = hook.commands.find(c => c.name() === 'dangerous-command');
    expect(dangerous?.description()).toBe('PreToolUse/Bash: deny destructive shell commands');
  });
});
