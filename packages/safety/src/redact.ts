import type { RuleTable } from './types.js';

export const REDACTED = '***REDACTED***';

/**
 * Replace every match of every rule with a placeholder, for log output
 */
export function redact(text: string, rules: RuleTable): string {
  let redacted = text;
  for (const rule of rules) {
    redacted = redacted.replace(new RegExp(rule.regex.source, 'gi'), REDACTED);
  }
  return redacted;
}
