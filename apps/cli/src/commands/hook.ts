/**
 * Hook Commands
 *
 * One subcommand per hook. Each reads the event payload from stdin and
 * always exits 0.
 */

import { Command } from 'commander';
import { HOOKS, HOOK_NAMES } from '../hooks/index.js';
import { executeHook } from '../hooks/runner.js';
import { readStdin, writeResult } from '../io.js';

export function hookCommands(): Command {
  const hook = new Command('hook')
    .description('Run a hook against the event payload on stdin');

  for (const name of HOOK_NAMES) {
    hook
      .command(name)
      .description(HOOKS[name].description)
      .action(async () => {
        // An unreadable stdin is treated like a malformed payload
        const raw = await readStdin().catch(() => '');
        writeResult(await executeHook(name, raw));
        process.exitCode = 0;
      });
  }

  return hook;
}
