/**
 * Decision building
 */

import type { Decision, Policy, ReasonFormatter, Rule } from './types.js';

export const defaultReason: ReasonFormatter = (rule, _subject, policy) =>
  policy === 'deny-on-match'
    ? `Blocked: ${rule.label}`
    : `Needs confirmation: ${rule.label}`;

/**
 * Map a match (or its absence) to a decision. No match is always a bare
 * allow.
 */
export function buildDecision(
  subject: string,
  match: Rule | undefined,
  policy: Policy,
  formatReason: ReasonFormatter = defaultReason
): Decision {
  if (!match) {
    return { outcome: 'allow' };
  }

  return {
    outcome: policy === 'deny-on-match' ? 'deny' : 'ask',
    reason: formatReason(match, subject, policy),
    matchedRule: match.label,
  };
}
