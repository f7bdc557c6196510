/**
 * Protected branch warning for commits
 */

import type { CheckerDefinition, Rule } from '../types.js';

export const PROTECTED_BRANCH_RULES: readonly Rule[] = [
  { pattern: '^main$', label: 'main' },
  { pattern: '^master$', label: 'master' },
  { pattern: '^production$', label: 'production' },
];

export function branchChecker(extraRules: readonly Rule[] = []): CheckerDefinition {
  return {
    id: 'branch',
    name: 'Protected Branch Check',
    description: 'Asks before committing directly to a protected branch',
    policy: 'warn-on-match',
    rules: [...PROTECTED_BRANCH_RULES, ...extraRules],
    formatReason: (rule, subject) => `Committing directly to protected branch '${subject}' (${rule.label})`,
  };
}
