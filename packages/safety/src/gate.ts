/**
 * Gate: the checkers for one process, built from one frozen config
 */

import {
  createChecker,
  dangerousCommandChecker,
  protectedPathChecker,
  secretChecker,
  branchChecker,
  normalizePath,
  scanDiff,
  type SecretFinding,
} from './checkers/index.js';
import { defaultConfig, type GateConfig } from './config.js';
import { redact } from './redact.js';
import type { Checker, CheckerId, Decision } from './types.js';

export interface GateStatus {
  checkers: Array<{ id: CheckerId; name: string; description: string; policy: string; rules: number }>;
  linters: Record<string, string>;
  disabledHooks: string[];
}

export class Gate {
  readonly config: Readonly<GateConfig>;
  private readonly checkers: Readonly<Record<CheckerId, Checker>>;

  constructor(config: Readonly<GateConfig> = defaultConfig()) {
    this.config = config;
    const extra = config.extraRules;

    this.checkers = Object.freeze({
      'dangerous-command': createChecker(dangerousCommandChecker(extra.dangerousCommands)),
      'protected-path': createChecker(protectedPathChecker(extra.protectedPaths)),
      secret: createChecker(secretChecker(extra.secrets)),
      branch: createChecker(branchChecker(extra.protectedBranches)),
    });
  }

  getChecker(id: CheckerId): Checker {
    return this.checkers[id];
  }

  getCheckers(): Checker[] {
    return Object.values(this.checkers);
  }

  /**
   * Check a shell command against the dangerous-command table
   */
  checkCommand(command: string): Decision {
    return this.checkers['dangerous-command'].check(command);
  }

  /**
   * Check a file path against the protected-path table
   */
  checkPath(filePath: string): Decision {
    return this.checkers['protected-path'].check(normalizePath(filePath));
  }

  checkBranch(branch: string): Decision {
    return this.checkers.branch.check(branch);
  }

  scanDiff(diff: string): SecretFinding[] {
    return scanDiff(diff, this.checkers.secret.rules);
  }

  /**
   * Mask anything the secret table recognizes
   */
  redact(text: string): string {
    return redact(text, this.checkers.secret.rules);
  }

  isHookEnabled(hookName: string): boolean {
    return !this.config.disabledHooks.includes(hookName);
  }

  getStatus(): GateStatus {
    const linters: Record<string, string> = {};
    for (const [ext, spec] of Object.entries(this.config.linters)) {
      linters[ext] = [spec.command, ...spec.args].join(' ');
    }

    return {
      checkers: this.getCheckers().map(checker => ({
        id: checker.id,
        name: checker.name,
        description: checker.description,
        policy: checker.policy,
        rules: checker.rules.length,
      })),
      linters,
      disabledHooks: [...this.config.disabledHooks],
    };
  }
}
