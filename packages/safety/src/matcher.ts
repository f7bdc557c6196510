import type { CompiledRule, RuleTable } from './types.js';

/**
 * Return the first rule, in table order, whose pattern matches the subject.
 */
export function evaluate(subject: string, rules: RuleTable): CompiledRule | undefined {
  for (const rule of rules) {
    if (rule.regex.test(subject)) {
      return rule;
    }
  }
  return undefined;
}
