/**
 * Hook runner: config, input parsing and fail-open error handling around
 * a single handler invocation
 */

import {
  HookLog,
  parseHookInput,
  wrapError,
  runCommand,
  type CommandRunner,
  type HookResult,
} from '@hook-gate/common';
import { Gate, loadConfig } from '@hook-gate/safety';
import { HOOKS, type HookName } from './index.js';

export interface ExecuteHookOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  platform?: NodeJS.Platform;
  runner?: CommandRunner;
  now?: () => Date;
}

/**
 * Run one hook against the raw stdin payload. Never throws: malformed
 * input, disabled hooks and handler failures all end without a decision.
 */
export async function executeHook(
  name: HookName,
  raw: string,
  options: ExecuteHookOptions = {}
): Promise<HookResult> {
  const messages: string[] = [];
  const now = options.now ?? (() => new Date());

  let gate: Gate;
  let log: HookLog;
  try {
    const loaded = loadConfig({ cwd: options.cwd, env: options.env, homeDir: options.homeDir });
    messages.push(...loaded.warnings.map(warning => `[hook-gate] ${warning}`));
    gate = new Gate(loaded.config);
    log = new HookLog(loaded.config.logDir, name, now);
  } catch (error) {
    const failure = wrapError(error, 'Could not load configuration');
    messages.push(`[hook-gate] ${name}: ${failure.message} [${failure.code}]`);
    return { messages };
  }

  if (!gate.isHookEnabled(name)) {
    return { messages };
  }

  const input = parseHookInput(raw);
  if (!input) {
    log.warn('Malformed input ignored');
    return { messages };
  }

  try {
    const result = await HOOKS[name].handler(input, {
      gate,
      log,
      runner: options.runner ?? runCommand,
      platform: options.platform ?? process.platform,
      now,
    });
    return {
      ...(result.output && { output: result.output }),
      messages: [...messages, ...result.messages],
    };
  } catch (error) {
    const failure = wrapError(error, `${name} hook failed`);
    log.error(`${failure.message} [${failure.code}]`);
    messages.push(`[${name}] ${failure.message}`);
    return { messages };
  }
}
