/**
 * Hook runner tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ProcessError, TimeoutError, type CommandResult, type CommandRunner } from '@hook-gate/common';
import { HOOK_NAMES } from './index.js';
import { executeHook, type ExecuteHookOptions } from './runner.js';

const fixed = new Date('2024-05-06T07:08:09.000Z');

function success(stdout: string): CommandResult {
  return { ok: true, exitCode: 0, stdout, stderr: '', timedOut: false };
}

function payload(value: unknown): string {
  return JSON.stringify(value);
}

describe('executeHook', () => {
  let dir: string;
  let logDir: string;
  let options: ExecuteHookOptions;
  let calls: Array<{ command: string; args: readonly string[] }>;

  const readLog = (hook: string): string =>
    fs.readFileSync(path.join(logDir, `${hook}.log`), 'utf-8');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hook-runner-'));
    logDir = path.join(dir, 'logs');
    calls = [];
    options = {
      cwd: dir,
      homeDir: dir,
      env: { HOOK_GATE_LOG_DIR: logDir, HOOK_GATE_BACKUP_DIR: path.join(dir, 'backups') },
      platform: 'linux',
      now: () => fixed,
      runner: async (command, args) => {
        calls.push({ command, args });
        return success('');
      },
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('fail-open on malformed input', () => {
    for (const name of HOOK_NAMES) {
      it(`${name} ignores a payload that is not JSON`, async () => {
        const result = await executeHook(name, '{"tool_name": "Bash",', options);

        expect(result).toEqual({ messages: [] });
        expect(readLog(name)).toBe(`[2024-05-06T07:08:09.000Z] WARN ${name}: Malformed input ignored\n`);
      });
    }

    it('ignores JSON that is not an object', async () => {
      const result = await executeHook('dangerous-command', '["rm -rf /"]', options);
      expect(result).toEqual({ messages: [] });
    });

    it('ignores an empty payload', async () => {
      const result = await executeHook('protected-path', '', options);
      expect(result).toEqual({ messages: [] });
    });
  });

  describe('dangerous-command', () => {
    it('denies rm -rf /', async () => {
      const result = await executeHook('dangerous-command', payload({
        hook_event_name: 'PreToolUse',
        tool_name: 'Bash',
        tool_input: { command: 'rm -rf /' },
      }), options);

      expect(result).toEqual({
        output: {
          hookSpecificOutput: {
            hookEventName: 'PreToolUse',
            permissionDecision: 'deny',
            permissionDecisionReason: 'Blocked dangerous command: rm -rf / (root deletion)',
          },
        },
        messages: [],
      });
      expect(readLog('dangerous-command')).toBe(
        '[2024-05-06T07:08:09.000Z] DENY dangerous-command: rm -rf / [rm -rf / (root deletion)]\n'
      );
    });

    it('stays silent for ls -la', async () => {
      const result = await executeHook('dangerous-command', payload({
        hook_event_name: 'PreToolUse',
        tool_name: 'Bash',
        tool_input: { command: 'ls -la' },
      }), options);

      expect(result).toEqual({ messages: [] });
      expect(readLog('dangerous-command')).toBe(
        '[2024-05-06T07:08:09.000Z] ALLOW dangerous-command: ls -la\n'
      );
    });

    it('redacts secrets before logging a command', async () => {
      await executeHook('dangerous-command', payload({
        tool_name: 'Bash',
        tool_input: { command: 'deploy --api_key=abcdefghijklmnop1234' },
      }), options);

      expect(readLog('dangerous-command')).toBe(
        '[2024-05-06T07:08:09.000Z] ALLOW dangerous-command: deploy --***REDACTED***\n'
      );
    });

    it('skips tools other than Bash', async () => {
      const result = await executeHook('dangerous-command', payload({
        tool_name: 'Read',
        tool_input: { file_path: 'rm -rf /' },
      }), options);

      expect(result).toEqual({ messages: [] });
      expect(readLog('dangerous-command')).toBe(
        '[2024-05-06T07:08:09.000Z] INFO dangerous-command: Skipped Read\n'
      );
    });
  });

  describe('protected-path', () => {
    it('denies a write under production/', async () => {
      const result = await executeHook('protected-path', payload({
        hook_event_name: 'PreToolUse',
        tool_name: 'Write',
        tool_input: { file_path: 'production/config.json', content: '{}' },
      }), options);

      expect(result.output).toEqual({
        hookSpecificOutput: {
          hookEventName: 'PreToolUse',
          permissionDecision: 'deny',
          permissionDecisionReason:
            'Protected path production/: production/config.json cannot be modified',
        },
      });
      expect(readLog('protected-path')).toBe(
        '[2024-05-06T07:08:09.000Z] DENY protected-path: Write production/config.json [production/]\n'
      );
    });

    it('checks notebook_path for NotebookEdit', async () => {
      const result = await executeHook('protected-path', payload({
        tool_name: 'NotebookEdit',
        tool_input: { notebook_path: 'secrets/analysis.ipynb' },
      }), options);

      expect(result.output?.hookSpecificOutput.permissionDecision).toBe('deny');
    });

    it('allows ordinary source files', async () => {
      const result = await executeHook('protected-path', payload({
        tool_name: 'Edit',
        tool_input: { file_path: 'src/index.ts' },
      }), options);

      expect(result).toEqual({ messages: [] });
    });
  });

  describe('commit-check', () => {
    const diff = [
      '--- a/src/config.ts',
      '+++ b/src/config.ts',
      '@@ -10,0 +11 @@',
      '+  api_key="abcd1234567890efghij"',
    ].join('\n');

    const repo: CommandRunner = async (command, args) => {
      if (command !== 'git') return success('');
      if (args[0] === 'rev-parse') return success('feature/login\n');
      if (args.includes('--name-only')) return success('');
      return success(diff);
    };

    it('asks for confirmation when a staged diff holds an API key', async () => {
      const result = await executeHook('commit-check', payload({
        hook_event_name: 'PreToolUse',
        tool_name: 'Bash',
        tool_input: { command: 'git add . && git commit -m "wire config"' },
      }), { ...options, runner: repo });

      expect(result.output).toEqual({
        hookSpecificOutput: {
          hookEventName: 'PreToolUse',
          permissionDecision: 'ask',
          permissionDecisionReason: [
            'Commit checks failed: secrets',
            'secrets: Possible secrets in staged changes:',
            '  src/config.ts:11 (API key)',
          ].join('\n'),
        },
      });
      expect(result.messages).toContain('✗ secrets: Possible secrets in staged changes:');
      expect(result.messages).toContain('✓ branch: On branch feature/login');
      expect(result.messages.at(-1)).toBe('Some commit checks failed');
      expect(readLog('commit-check')).toBe(
        '[2024-05-06T07:08:09.000Z] ASK commit-check: Failed checks: secrets\n'
      );
    });

    it('reports without a decision when every check passes', async () => {
      const result = await executeHook('commit-check', payload({
        tool_name: 'Bash',
        tool_input: { command: 'git commit -m "docs"' },
      }), {
        ...options,
        runner: async (command, args) => {
          if (args[0] === 'rev-parse') return success('feature/docs\n');
          return success('');
        },
      });

      expect(result.output).toBeUndefined();
      expect(result.messages).toHaveLength(4);
      expect(result.messages.at(-1)).toBe('All commit checks passed');
    });

    it('ignores commands that are not commits', async () => {
      const result = await executeHook('commit-check', payload({
        tool_name: 'Bash',
        tool_input: { command: 'git status' },
      }), options);

      expect(result).toEqual({ messages: [] });
      expect(calls).toEqual([]);
    });
  });

  describe('lint', () => {
    it('reports linter failures on stderr without a decision', async () => {
      const runner: CommandRunner = async (command, args) => {
        calls.push({ command, args });
        return {
          ok: false,
          exitCode: 1,
          stdout: 'src/app.py:1:1: F401 unused import\n',
          stderr: '',
          timedOut: false,
          error: new ProcessError('ruff exited with code 1', { command: 'ruff', exitCode: 1 }),
        };
      };

      const result = await executeHook('lint', payload({
        hook_event_name: 'PostToolUse',
        tool_name: 'Write',
        tool_input: { file_path: 'src/app.py' },
      }), { ...options, runner });

      expect(calls).toEqual([{ command: 'ruff', args: ['check', 'src/app.py'] }]);
      expect(result).toEqual({
        messages: [
          '[lint] src/app.py',
          'Lint issues found:',
          'ruff exited with code 1',
          '  src/app.py:1:1: F401 unused import',
        ],
      });
    });

    it('does nothing for files without a linter', async () => {
      const result = await executeHook('lint', payload({
        hook_event_name: 'PostToolUse',
        tool_name: 'Write',
        tool_input: { file_path: 'notes.txt' },
      }), options);

      expect(result).toEqual({ messages: [] });
      expect(calls).toEqual([]);
    });
  });

  describe('notify', () => {
    it('sends the message through notify-send on linux', async () => {
      const result = await executeHook('notify', payload({
        hook_event_name: 'Notification',
        message: 'Waiting for input',
      }), options);

      expect(result).toEqual({ messages: [] });
      expect(calls).toEqual([{ command: 'notify-send', args: ['Assistant', 'Waiting for input'] }]);
    });

    it('logs instead of failing on an unsupported platform', async () => {
      const result = await executeHook('notify', payload({
        hook_event_name: 'Notification',
        message: 'Waiting for input',
      }), { ...options, platform: 'aix' });

      expect(result).toEqual({ messages: [] });
      expect(readLog('notify')).toBe(
        '[2024-05-06T07:08:09.000Z] WARN notify: No notifier for platform aix: Waiting for input\n'
      );
    });
  });

  describe('error handling', () => {
    it('turns a handler failure into a message and no decision', async () => {
      const result = await executeHook('notify', payload({
        hook_event_name: 'Notification',
        message: 'Done',
      }), {
        ...options,
        runner: async () => {
          throw new Error('spawn exploded');
        },
      });

      expect(result).toEqual({ messages: ['[notify] spawn exploded'] });
      expect(readLog('notify')).toBe('[2024-05-06T07:08:09.000Z] ERROR notify: spawn exploded [UNKNOWN_ERROR]\n');
    });

    it('logs the code of a gate error thrown by a handler', async () => {
      const result = await executeHook('notify', payload({
        hook_event_name: 'Notification',
        message: 'Done',
      }), {
        ...options,
        runner: async () => {
          throw new TimeoutError('notify-send timed out after 5000ms', 5000);
        },
      });

      expect(result).toEqual({ messages: ['[notify] notify-send timed out after 5000ms'] });
      expect(readLog('notify')).toBe(
        '[2024-05-06T07:08:09.000Z] ERROR notify: notify-send timed out after 5000ms [TIMEOUT]\n'
      );
    });

    it('falls back to a generic message for a non-error throw', async () => {
      const result = await executeHook('notify', payload({
        hook_event_name: 'Notification',
        message: 'Done',
      }), {
        ...options,
        runner: async () => {
          throw 42;
        },
      });

      expect(result).toEqual({ messages: ['[notify] notify hook failed'] });
    });

    it('does nothing for a disabled hook', async () => {
      const result = await executeHook('dangerous-command', payload({
        tool_name: 'Bash',
        tool_input: { command: 'rm -rf /' },
      }), { ...options, env: { ...options.env, HOOK_GATE_DISABLE: 'lint, dangerous-command' } });

      expect(result).toEqual({ messages: [] });
      expect(fs.existsSync(path.join(logDir, 'dangerous-command.log'))).toBe(false);
    });

    it('falls back to defaults when the config file is invalid', async () => {
      fs.writeFileSync(path.join(dir, '.hook-gate.yaml'), 'maxWorkers: lots\n');

      const result = await executeHook('dangerous-command', payload({
        tool_name: 'Bash',
        tool_input: { command: 'rm -rf /' },
      }), options);

      expect(result.output?.hookSpecificOutput.permissionDecision).toBe('deny');
      expect(result.messages).toHaveLength(1);
      expect(result.messages[0]).toMatch(/^\[hook-gate\] .*; using defaults$/);
    });
  });
});
