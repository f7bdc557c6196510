/**
 * Safety Commands
 *
 * Diagnostics for the rule tables the hooks use.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { Gate, formatFinding, loadConfig, stagedDiff } from '@hook-gate/safety';
import type { Decision } from '@hook-gate/safety';

interface JsonOption {
  json?: boolean;
}

function createGate(): Gate {
  const { config, warnings } = loadConfig();
  for (const warning of warnings) {
    console.error(chalk.yellow(`[hook-gate] ${warning}`));
  }
  return new Gate(config);
}

function printDecision(subject: string, decision: Decision): void {
  switch (decision.outcome) {
    case 'allow':
      console.log(chalk.green(`✓ ${subject} is allowed`));
      break;
    case 'ask':
      console.log(chalk.yellow(`? ${subject} needs confirmation`));
      console.log(chalk.yellow(`\nReason: ${decision.reason ?? decision.matchedRule}`));
      break;
    case 'deny':
      console.log(chalk.red(`✗ ${subject} is blocked`));
      console.log(chalk.red(`\nReason: ${decision.reason ?? decision.matchedRule}`));
      break;
  }
  console.log();
}

export function safetyCommands(): Command {
  const safety = new Command('safety')
    .description('Inspect and try out the safety rules');

  safety
    .command('status')
    .description('Show checkers, rule counts and linters')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonOption) => {
      const status = createGate().getStatus();

      if (options.json) {
        console.log(JSON.stringify(status, null, 2));
        return;
      }

      console.log(chalk.bold('\nCheckers:\n'));
      for (const checker of status.checkers) {
        const policy = checker.policy === 'deny-on-match' ? chalk.red('deny') : chalk.yellow('ask ');
        console.log(`  ${policy} ${chalk.cyan(checker.id.padEnd(20))} ${checker.rules} rules  ${chalk.gray(checker.description)}`);
      }

      console.log(chalk.bold('\nLinters:\n'));
      for (const [ext, linter] of Object.entries(status.linters)) {
        console.log(`  ${chalk.cyan(ext.padEnd(8))} ${linter}`);
      }

      if (status.disabledHooks.length > 0) {
        console.log(chalk.bold('\nDisabled hooks: ') + status.disabledHooks.join(', '));
      }
      console.log();
    });

  safety
    .command('test <command>')
    .description('Check a shell command against the dangerous-command rules')
    .option('--json', 'Output as JSON')
    .action(async (command: string, options: JsonOption) => {
      const decision = createGate().checkCommand(command);

      if (options.json) {
        console.log(JSON.stringify(decision, null, 2));
        return;
      }
      printDecision('Command', decision);
    });

  safety
    .command('check-file <path>')
    .description('Check a file path against the protected-path rules')
    .option('--json', 'Output as JSON')
    .action(async (filePath: string, options: JsonOption) => {
      const decision = createGate().checkPath(filePath);

      if (options.json) {
        console.log(JSON.stringify(decision, null, 2));
        return;
      }
      printDecision(`Write to ${filePath}`, decision);
    });

  safety
    .command('scan')
    .description('Scan staged changes for secrets')
    .option('--json', 'Output as JSON')
    .action(async (options: JsonOption) => {
      const gate = createGate();
      const diff = await stagedDiff({ timeoutMs: gate.config.gitTimeoutMs });

      if (!diff.ok) {
        console.error(chalk.red(`[hook-gate] ${diff.error}`));
        process.exitCode = 1;
        return;
      }

      const findings = gate.scanDiff(diff.value);
      if (options.json) {
        console.log(JSON.stringify(findings, null, 2));
        return;
      }

      if (findings.length === 0) {
        console.log(chalk.green('✓ No secrets found in staged changes\n'));
        return;
      }

      console.log(chalk.yellow('Possible secrets in staged changes:'));
      for (const finding of findings) {
        console.log(`  - ${formatFinding(finding)}`);
      }
      console.log();
    });

  return safety;
}
