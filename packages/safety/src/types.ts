/**
 * Rule-based gate types
 */

/**
 * A single entry of a rule table. `pattern` is regular expression source,
 * always evaluated case-insensitively.
 */
export interface Rule {
  readonly pattern: string;
  readonly label: string;
}

export interface CompiledRule extends Rule {
  readonly regex: RegExp;
}

/** Ordered, frozen, never empty. */
export type RuleTable = readonly [CompiledRule, ...CompiledRule[]];

export type Policy = 'deny-on-match' | 'warn-on-match';

export type Outcome = 'allow' | 'deny' | 'ask';

export interface Decision {
  outcome: Outcome;
  reason?: string;
  matchedRule?: string;
}

export type ReasonFormatter = (rule: Rule, subject: string, policy: Policy) => string;

export type CheckerId = 'dangerous-command' | 'protected-path' | 'secret' | 'branch';

export interface CheckerDefinition {
  id: CheckerId;
  name: string;
  description: string;
  policy: Policy;
  rules: readonly Rule[];
  formatReason?: ReasonFormatter;
}

export interface Checker {
  readonly id: CheckerId;
  readonly name: string;
  readonly description: string;
  readonly policy: Policy;
  readonly rules: RuleTable;
  check(subject: string): Decision;
}

// ============================================================================
// Parallel checks
// ============================================================================

export interface CheckOutcome {
  passed: boolean;
  message: string;
}

export interface CheckResult extends CheckOutcome {
  name: string;
}

export interface NamedCheck {
  name: string;
  run: () => CheckOutcome | Promise<CheckOutcome>;
}

export interface DispatchResult {
  /** In completion order, not submission order */
  results: CheckResult[];
  passed: boolean;
}
