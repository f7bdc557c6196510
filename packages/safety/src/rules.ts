/**
 * Rule table construction
 */

import { ValidationError } from '@hook-gate/common';
import type { CompiledRule, Rule, RuleTable } from './types.js';

/**
 * Check whether a pattern compiles
 */
export function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

/**
 * Compile an ordered list of rules into a frozen table. Patterns are
 * compiled once, case-insensitively.
 */
export function createRuleTable(rules: readonly Rule[]): RuleTable {
  const compiled: CompiledRule[] = rules.map((rule, index) => {
    if (!isValidPattern(rule.pattern)) {
      throw new ValidationError(`Invalid pattern for rule "${rule.label}"`, {
        index,
        pattern: rule.pattern,
      });
    }
    return Object.freeze({
      pattern: rule.pattern,
      label: rule.label,
      regex: new RegExp(rule.pattern, 'i'),
    });
  });

  const [first, ...rest] = compiled;
  if (!first) {
    throw new ValidationError('Rule table must contain at least one rule');
  }
  return Object.freeze([first, ...rest] as const);
}
