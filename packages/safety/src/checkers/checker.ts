/**
 * Checker factory
 */

import { buildDecision } from '../decision.js';
import { evaluate } from '../matcher.js';
import { createRuleTable } from '../rules.js';
import type { Checker, CheckerDefinition } from '../types.js';

/**
 * Bind a rule table to a policy. The table is compiled once here and the
 * returned checker is frozen.
 */
export function createChecker(definition: CheckerDefinition): Checker {
  const rules = createRuleTable(definition.rules);
  const { id, name, description, policy, formatReason } = definition;

  return Object.freeze({
    id,
    name,
    description,
    policy,
    rules,
    check(subject: string) {
      return buildDecision(subject, evaluate(subject, rules), policy, formatReason);
    },
  });
}
