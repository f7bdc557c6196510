/**
 * CLI program definition
 */

import { Command } from 'commander';
import { hookCommands } from './commands/hook.js';
import { safetyCommands } from './commands/safety.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('hook-gate')
    .description('Rule-based hook commands for an AI coding assistant')
    .version('1.0.0');

  program.addCommand(hookCommands());
  program.addCommand(safetyCommands());

  return program;
}
